/**
 * Vote decision and the bug-fix test policy.
 */

import { FileCategory, TEST_CATEGORIES } from "../analysis/categories";
import { raiseSeverity } from "./findings";
import { Change, PullRequestMetadata, RawComment, ReviewVerdict, Vote } from "./types";

/**
 * Map a verdict to a vote. Rules are evaluated in order; unknown severities
 * produce a neutral vote.
 */
export function decideVote(approved: boolean, severity: string): Vote {
  if (approved && (severity === "approved" || severity === "minor")) return 10;
  if (severity === "minor") return 5;
  if (severity === "major") return -5;
  if (severity === "critical") return -10;
  return 0;
}

export function describeVote(vote: Vote): string {
  switch (vote) {
    case 10:
      return "Approved";
    case 5:
      return "Approved with suggestions";
    case 0:
      return "No vote";
    case -5:
      return "Waiting for author";
    case -10:
      return "Rejected";
  }
}

// ============================================================================
// Test Policy
// ============================================================================

export interface TestPolicy {
  requireTestsForBugFixes: boolean;
  bugFixKeywords: string[];
}

export interface PolicyViolation {
  comment: RawComment;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function matchesBugFixKeyword(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) =>
    new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "i").test(text)
  );
}

/**
 * A bug fix must ship with tests: a test category in the change set, or at
 * least one change flagged as a test file.
 */
export function evaluateTestPolicy(params: {
  metadata: PullRequestMetadata;
  categories: Map<FileCategory, string[]>;
  changes: Change[];
  policy: TestPolicy;
}): PolicyViolation | null {
  const { metadata, categories, changes, policy } = params;
  if (!policy.requireTestsForBugFixes || policy.bugFixKeywords.length === 0) {
    return null;
  }

  const text = `${metadata.title}\n${metadata.description}`;
  if (!matchesBugFixKeyword(text, policy.bugFixKeywords)) {
    return null;
  }

  const hasTestCategory = [...categories].some(
    ([category, files]) => TEST_CATEGORIES.has(category) && files.length > 0
  );
  if (hasTestCategory || changes.some((c) => c.is_test_file)) {
    return null;
  }

  return {
    comment: {
      content:
        "Bug fix detected without accompanying tests. Add regression tests that reproduce the bug and verify the fix.",
      severity: "error",
      issue_type: "missing_tests",
    },
  };
}

/**
 * Fold a policy violation into a verdict: not approved, at least major.
 */
export function applyPolicyOutcome(verdict: ReviewVerdict, violation: PolicyViolation | null): ReviewVerdict {
  if (!violation) {
    return verdict;
  }
  return {
    ...verdict,
    approved: false,
    severity: raiseSeverity(verdict.severity, "major"),
    comments: [...verdict.comments, violation.comment],
  };
}
