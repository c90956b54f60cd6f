/**
 * Tests for the publication ledger, the posting orchestrator and the
 * summary comment.
 */

import { PublicationLedger } from "../src/publishing/ledger";
import { PublishParams, publishReview } from "../src/publishing/orchestrator";
import { formatReviewSummary } from "../src/publishing/summary";
import { emptyDependencySummary } from "../src/analysis/dependencies/analyzer";
import { ConsolidatedComment, PullRequestKey, ReviewVerdict } from "../src/review/types";
import { FakeHostingClient } from "./fixtures/fake-host";

const key: PullRequestKey = { repositoryId: "acme/shop", pullRequestId: 12 };

function located(filePath: string, line: number, content: string): ConsolidatedComment {
  return { location: { file_path: filePath, line_number: line }, content, severity: "warning" };
}

describe("PublicationLedger", () => {
  it("should reserve each pull request once", () => {
    const ledger = new PublicationLedger();

    expect(ledger.tryReserve(key)).toBe(true);
    expect(ledger.tryReserve(key)).toBe(false);
    expect(ledger.isPending(key)).toBe(true);
    expect(ledger.has(key)).toBe(false);

    ledger.commit(key);
    expect(ledger.has(key)).toBe(true);
    expect(ledger.isPending(key)).toBe(false);
  });

  it("should only release reservations", () => {
    const ledger = new PublicationLedger();
    ledger.tryReserve(key);
    ledger.commit(key);
    ledger.release(key);
    expect(ledger.has(key)).toBe(true);

    const other = { ...key, pullRequestId: 13 };
    ledger.tryReserve(other);
    ledger.release(other);
    expect(ledger.size).toBe(1);

    ledger.clear();
    expect(ledger.size).toBe(0);
  });

  it("should keep repositories apart", () => {
    const ledger = new PublicationLedger();
    ledger.tryReserve(key);
    expect(ledger.tryReserve({ repositoryId: "acme/billing", pullRequestId: 12 })).toBe(true);
  });
});

describe("publishReview", () => {
  let host: FakeHostingClient;
  let ledger: PublicationLedger;

  beforeEach(() => {
    host = new FakeHostingClient();
    ledger = new PublicationLedger();
  });

  it("should post line comments, the summary and the vote", async () => {
    const consolidated = new Map<string, ConsolidatedComment>([
      ["a.cs:10", located("a.cs", 10, "**[WARNING]**: x")],
      ["b.cs:3", located("b.cs", 3, "**[WARNING]**: y")],
    ]);

    const result = await publishReview(host, ledger, { key, consolidated, summary: "Summary", vote: -5 });

    expect(result).toEqual({ comments_posted: 2, vote_updated: true, errors: [], duplicate: false });
    expect(host.threads).toEqual([
      { key, content: "**[WARNING]**: x", filePath: "a.cs", line: 10 },
      { key, content: "**[WARNING]**: y", filePath: "b.cs", line: 3 },
      { key, content: "Summary", filePath: undefined, line: undefined },
    ]);
    expect(host.votes).toEqual([-5]);
    expect(ledger.has(key)).toBe(true);
  });

  it("should skip comments without a location", async () => {
    const result = await publishReview(host, ledger, {
      key,
      consolidated: [{ location: null, content: "general", severity: "info" }, located("a.cs", 1, "c")],
      summary: "Summary",
      vote: 10,
    });

    expect(result.comments_posted).toBe(1);
    expect(host.threads.map((t) => t.content)).toEqual(["c", "Summary"]);
  });

  it("should make no host calls for a published pull request", async () => {
    await publishReview(host, ledger, { key, consolidated: [], summary: "Summary", vote: 10 });
    const callsAfterFirst = host.calls;

    const second = await publishReview(host, ledger, { key, consolidated: [], summary: "Summary", vote: 10 });

    expect(second).toEqual({ comments_posted: 0, vote_updated: false, errors: [], duplicate: true });
    expect(host.calls).toBe(callsAfterFirst);
  });

  it("should publish once when two calls race on one pull request", async () => {
    const params: PublishParams = { key, consolidated: [located("a.cs", 10, "x")], summary: "Summary", vote: -5 };

    const results = await Promise.all([publishReview(host, ledger, params), publishReview(host, ledger, params)]);

    expect(results.map((result) => result.duplicate)).toEqual([false, true]);
    expect(results[0].comments_posted).toBe(1);
    expect(host.calls).toBe(3);
    expect(host.votes).toEqual([-5]);
  });

  it("should post a rejected line comment as a general comment", async () => {
    host.rejectedLines.add("a.cs:10");
    const consolidated = [located("a.cs", 10, "**[WARNING]**: x"), located("b.cs", 3, "**[WARNING]**: y")];

    const result = await publishReview(host, ledger, { key, consolidated, summary: "Summary", vote: -5 });

    expect(result).toEqual({ comments_posted: 2, vote_updated: true, errors: [], duplicate: false });
    expect(host.threads).toEqual([
      { key, content: "**a.cs:10**\n\n**[WARNING]**: x", filePath: undefined, line: undefined },
      { key, content: "**[WARNING]**: y", filePath: "b.cs", line: 3 },
      { key, content: "Summary", filePath: undefined, line: undefined },
    ]);
    expect(ledger.has(key)).toBe(true);
  });

  it("should continue after a failed comment and allow a retry", async () => {
    host.failingPaths.add("b.cs");
    const consolidated = [located("a.cs", 10, "x"), located("b.cs", 3, "y")];

    const result = await publishReview(host, ledger, { key, consolidated, summary: "Summary", vote: -5 });

    expect(result).toEqual({
      comments_posted: 1,
      vote_updated: true,
      errors: ["Failed to post comment at b.cs:3: 403 Forbidden"],
      duplicate: false,
    });
    expect(ledger.has(key)).toBe(false);
    expect(ledger.isPending(key)).toBe(false);

    host.failingPaths.clear();
    const retry = await publishReview(host, ledger, { key, consolidated, summary: "Summary", vote: -5 });
    expect(retry.errors).toEqual([]);
    expect(retry.duplicate).toBe(false);
    expect(ledger.has(key)).toBe(true);
  });

  it("should report summary and vote failures", async () => {
    host.failingPaths.add("");
    host.failVote = true;

    const result = await publishReview(host, ledger, { key, consolidated: [], summary: "Summary", vote: 0 });

    expect(result.errors).toEqual([
      "Failed to post summary: 403 Forbidden",
      "Failed to update vote: 422 Unprocessable Entity",
    ]);
    expect(result.vote_updated).toBe(false);
  });
});

describe("formatReviewSummary", () => {
  const verdict: ReviewVerdict = {
    approved: false,
    severity: "major",
    summary: "Needs work",
    comments: [
      { file_path: "a.cs", line_number: 10, content: "x", severity: "warning" },
      { content: "General note", severity: "info" },
    ],
    test_suggestions: [],
  };

  it("should lay out status, comments, summary and statistics", () => {
    const summary = formatReviewSummary({
      verdict,
      general: [{ content: "General note", severity: "info" }],
      vote: -5,
    });

    expect(summary).toBe(
      [
        "## Automated Code Review Results",
        "",
        "**Review Status: CHANGES REQUIRED (Major Issues)**",
        "**Vote:** Waiting for author (-5)",
        "",
        "### General Review Comments",
        "**[INFO]**: General note",
        "",
        "### Line-Specific Issues Found",
        "**Code quality issues: 1**",
        "",
        "### Summary",
        "Needs work",
        "",
        "### Review Statistics",
        "- Critical errors: 0",
        "- Warnings: 1",
        "- Suggestions: 1",
        "",
        "---",
        "*This review was generated automatically by diffwarden*",
      ].join("\n")
    );
  });

  it("should list vulnerable packages up to the cap", () => {
    const summary = formatReviewSummary({
      verdict: { ...verdict, comments: [] },
      general: [],
      vote: -5,
      dependencySummary: {
        ...emptyDependencySummary(),
        total_packages_examined: 4,
        packages_by_type: { npm: 4 },
        vulnerable_packages: 4,
        vulnerable_list: ["a@1", "b@1", "c@1", "d@1"],
        has_issues: true,
      },
    });

    expect(summary).toContain(
      [
        "### Package Security Analysis",
        "**Packages examined: 4**",
        "",
        "Package types analyzed:",
        "- npm: 4 packages",
        "",
        "**CRITICAL: 4 vulnerable package(s) found:**",
        "- a@1",
        "- b@1",
        "- c@1",
        "- ... and 1 more",
      ].join("\n")
    );
  });

  it("should report a clean package scan", () => {
    const summary = formatReviewSummary({
      verdict: { ...verdict, comments: [] },
      general: [],
      vote: -5,
      dependencySummary: { ...emptyDependencySummary(), total_packages_examined: 1, packages_by_type: { pypi: 1 } },
    });

    expect(summary).toContain("**Result: No package vulnerabilities detected**");
  });

  it("should break down security and testing issues", () => {
    const summary = formatReviewSummary({
      verdict: {
        ...verdict,
        comments: [
          { file_path: "a.cs", line_number: 3, content: "S".repeat(100), severity: "error", issue_type: "security" },
          { file_path: "b.cs", line_number: 1, content: "missing", severity: "error", issue_type: "missing_tests" },
        ],
      },
      general: [],
      vote: -5,
    });

    expect(summary).toContain(
      `**Security violations: 1**\n  - a.cs line 3: ${"S".repeat(80)}\n**Testing violations: 1**\n\n`
    );
  });

  it("should take the status from the vote", () => {
    const summary = formatReviewSummary({ verdict: { ...verdict, approved: true }, general: [], vote: -5 });
    expect(summary).toContain("**Review Status: CHANGES REQUIRED (Major Issues)**\n**Vote:** Waiting for author (-5)");
  });

  it("should flag unrecognized severities", () => {
    const summary = formatReviewSummary({ verdict: { ...verdict, severity: "blocker" }, general: [], vote: 0 });
    expect(summary).toContain("**Review Status: NO VOTE (Unrecognized Severity)**\n**Vote:** No vote (0)");
  });

  it("should render test suggestions with a fenced stub", () => {
    const summary = formatReviewSummary({
      verdict: {
        ...verdict,
        approved: true,
        severity: "minor",
        comments: [],
        test_suggestions: [
          {
            test_name: "rejects empty carts",
            description: "Checkout fails for an empty cart",
            test_code: "it('rejects', () => {\\n  expect(true).toBe(true);\\n});",
            file_path: "tests/checkout.test.ts",
          },
        ],
      },
      general: [],
      vote: 10,
    });

    expect(summary).toContain("**Review Status: APPROVED**\n**Vote:** Approved (10)");
    expect(summary).toContain(
      [
        "### Required Test Cases",
        "The following 1 test case(s) should be added:",
        "",
        "#### 1. rejects empty carts",
        "**File:** tests/checkout.test.ts",
        "**Purpose:** Checkout fails for an empty cart",
        "",
        "**Stubbed Implementation:**",
        "```typescript",
        "it('rejects', () => {\n  expect(true).toBe(true);\n});",
        "```",
      ].join("\n")
    );
  });
});
