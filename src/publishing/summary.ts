/**
 * Markdown summary comment for a published review.
 */

import * as path from "path";
import { DependencySummary, RawComment, ReviewVerdict, TestSuggestion, Vote } from "../review/types";
import { describeVote } from "../review/vote";

const MAX_VULNERABLE_LISTED = 3;
const MAX_SECURITY_LISTED = 2;
const SNIPPET_LENGTH = 80;

const CODE_FENCE_LANGUAGES: Record<string, string> = {
  ".cs": "csharp",
  ".ts": "typescript",
  ".tsx": "typescript",
  ".js": "javascript",
  ".jsx": "javascript",
  ".py": "python",
  ".java": "java",
};

const KNOWN_SEVERITIES = new Set(["approved", "minor", "major", "critical"]);

// Follows the vote so the summary never contradicts it
function statusLine(vote: Vote, severity: string): string {
  switch (vote) {
    case 10:
      return "**Review Status: APPROVED**";
    case 5:
      return "**Review Status: APPROVED WITH SUGGESTIONS**";
    case -5:
      return "**Review Status: CHANGES REQUIRED (Major Issues)**";
    case -10:
      return "**Review Status: AUTOMATIC REJECTION (Critical Issues)**";
    case 0:
      return KNOWN_SEVERITIES.has(severity)
        ? "**Review Status: NO VOTE**"
        : "**Review Status: NO VOTE (Unrecognized Severity)**";
  }
}

function packageSection(summary: DependencySummary): string[] {
  const lines = [
    "### Package Security Analysis",
    `**Packages examined: ${summary.total_packages_examined}**`,
  ];

  const types = Object.entries(summary.packages_by_type);
  if (types.length > 0) {
    lines.push("", "Package types analyzed:");
    for (const [ecosystem, count] of types) {
      lines.push(`- ${ecosystem}: ${count} packages`);
    }
  }

  lines.push("");
  if (summary.has_issues) {
    lines.push(`**CRITICAL: ${summary.vulnerable_packages} vulnerable package(s) found:**`);
    for (const entry of summary.vulnerable_list.slice(0, MAX_VULNERABLE_LISTED)) {
      lines.push(`- ${entry}`);
    }
    if (summary.vulnerable_list.length > MAX_VULNERABLE_LISTED) {
      lines.push(`- ... and ${summary.vulnerable_list.length - MAX_VULNERABLE_LISTED} more`);
    }
  } else {
    lines.push("**Result: No package vulnerabilities detected**");
  }
  lines.push("");
  return lines;
}

function issueBreakdown(comments: RawComment[]): string[] {
  const located = comments.filter((c) => (c.line_number ?? 0) > 0 && c.file_path);
  if (located.length === 0) {
    return [];
  }

  const security = located.filter((c) => c.issue_type === "security");
  const testing = located.filter((c) => c.issue_type === "missing_tests");
  const lines = ["### Line-Specific Issues Found"];

  if (security.length > 0) {
    lines.push(`**Security violations: ${security.length}**`);
    for (const issue of security.slice(0, MAX_SECURITY_LISTED)) {
      lines.push(`  - ${issue.file_path} line ${issue.line_number}: ${issue.content.slice(0, SNIPPET_LENGTH)}`);
    }
  }
  if (testing.length > 0) {
    lines.push(`**Testing violations: ${testing.length}**`);
  }
  const other = located.length - security.length - testing.length;
  if (other > 0) {
    lines.push(`**Code quality issues: ${other}**`);
  }
  lines.push("");
  return lines;
}

function statistics(comments: RawComment[]): string[] {
  const count = (severity: string) => comments.filter((c) => c.severity === severity).length;
  return [
    "### Review Statistics",
    `- Critical errors: ${count("error")}`,
    `- Warnings: ${count("warning")}`,
    `- Suggestions: ${count("info")}`,
    "",
  ];
}

function suggestionSection(suggestions: TestSuggestion[]): string[] {
  const lines = [
    "### Required Test Cases",
    `The following ${suggestions.length} test case(s) should be added:`,
    "",
  ];

  suggestions.forEach((suggestion, index) => {
    const name = suggestion.test_name || `Test_${index + 1}`;
    lines.push(`#### ${index + 1}. ${name}`);
    if (suggestion.file_path) {
      lines.push(`**File:** ${suggestion.file_path}`);
    }
    if (suggestion.description) {
      lines.push(`**Purpose:** ${suggestion.description}`, "");
    }
    if (suggestion.test_code) {
      const ext = suggestion.file_path ? path.extname(suggestion.file_path).toLowerCase() : "";
      lines.push("**Stubbed Implementation:**");
      lines.push("```" + (CODE_FENCE_LANGUAGES[ext] ?? ""));
      // Agents sometimes double-escape newlines inside test code
      lines.push(suggestion.test_code.replace(/\\n/g, "\n"));
      lines.push("```");
    }
    lines.push("");
  });
  return lines;
}

/**
 * Build the summary comment posted alongside the line comments.
 */
export function formatReviewSummary(params: {
  verdict: ReviewVerdict;
  general: RawComment[];
  vote: Vote;
  dependencySummary?: DependencySummary;
}): string {
  const { verdict, general, vote, dependencySummary } = params;

  const lines = [
    "## Automated Code Review Results",
    "",
    statusLine(vote, verdict.severity),
    `**Vote:** ${describeVote(vote)} (${vote})`,
    "",
  ];

  if (dependencySummary && dependencySummary.total_packages_examined > 0) {
    lines.push(...packageSection(dependencySummary));
  }

  if (general.length > 0) {
    lines.push("### General Review Comments");
    for (const comment of general) {
      lines.push(`**[${comment.severity.toUpperCase()}]**: ${comment.content}`);
    }
    lines.push("");
  }

  lines.push(...issueBreakdown(verdict.comments));

  if (verdict.summary) {
    lines.push("### Summary", verdict.summary, "");
  }

  if (verdict.comments.length > 0) {
    lines.push(...statistics(verdict.comments));
  }

  if (verdict.test_suggestions.length > 0) {
    lines.push(...suggestionSection(verdict.test_suggestions));
  }

  lines.push("---", "*This review was generated automatically by diffwarden*");
  return lines.join("\n");
}
