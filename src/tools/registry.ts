/**
 * Named tool operations exposing each pipeline stage.
 *
 * Every operation resolves to a JSON-serializable value. Failures are
 * reported as strings starting with "Error: " and never thrown.
 */

import { ReviewAgent } from "../integrations/agent/agent";
import { HostingClient } from "../integrations/github/hosting";
import { createLogger, errorMessage } from "../logger";
import { PublicationLedger } from "../publishing/ledger";
import { FinalizedReview, finalizeReview, prepareReview, publishFinalized, runReview } from "../review/pipeline";
import { PostingResult, PullRequestKey, Vote } from "../review/types";
import { describeVote } from "../review/vote";
import {
  ToolParamError,
  ToolParams,
  asParams,
  optionalBoolean,
  optionalPositiveInt,
  optionalString,
  readPullRequestKey,
  readStatus,
  requireString,
} from "./params";

const log = createLogger("Tools");

export interface ToolContext {
  host: HostingClient;
  ledger: PublicationLedger;
  agent: ReviewAgent | null;
}

export type ToolResult = string | Record<string, unknown>;

export interface ToolDefinition {
  name: string;
  description: string;
  run(params: ToolParams, ctx: ToolContext): Promise<ToolResult>;
}

// ============================================================================
// Helpers
// ============================================================================

function parseReviewJsonParam(params: ToolParams): unknown {
  const text = requireString(params, "review_json");
  try {
    return JSON.parse(text);
  } catch {
    throw new Error("Invalid JSON format in review_json parameter");
  }
}

function postingStatus(result: PostingResult): "success" | "partial_success" | "duplicate" {
  if (result.duplicate) return "duplicate";
  return result.errors.length > 0 ? "partial_success" : "success";
}

function postingReport(pullRequestId: number, result: PostingResult, finalized: FinalizedReview | null) {
  return {
    status: postingStatus(result),
    pr_id: pullRequestId,
    comments_posted: result.comments_posted,
    vote_updated: result.vote_updated,
    vote: finalized ? finalized.vote : null,
    review_status: finalized ? finalized.verdict.severity : null,
    approved: finalized ? finalized.verdict.approved : null,
    errors: result.errors,
  };
}

function formatVote(vote: Vote): string {
  return `${describeVote(vote)} (${vote})`;
}

const VOTES_BY_NAME = new Map<string, Vote>([
  ["approve", 10],
  ["approve_with_suggestions", 5],
  ["no_vote", 0],
  ["wait_for_author", -5],
  ["reject", -10],
]);

/** "wait_for_author" -> "Wait For Author" */
function voteTitle(name: string): string {
  return name
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

function readVote(params: ToolParams): { name: string; vote: Vote } {
  const name = requireString(params, "vote");
  const vote = VOTES_BY_NAME.get(name);
  if (vote === undefined) {
    throw new ToolParamError(`Invalid vote '${name}'. Must be one of: ${[...VOTES_BY_NAME.keys()].join(", ")}`);
  }
  return { name, vote };
}

const MIN_REJECTION_REASON = 10;

function confirmationRequired(action: string, key: PullRequestKey): string {
  return [
    `CONFIRMATION REQUIRED: you are about to ${action} PR #${key.pullRequestId} in ${key.repositoryId}.`,
    "Call the tool again with confirm=true to proceed.",
  ].join("\n");
}

interface ReviewNeed {
  id: number;
  title: string;
  author: string;
  created_at: string;
  source_branch: string;
  target_branch: string;
  reason: string;
  your_status: string;
  is_reviewer: boolean;
}

/**
 * Standing of this service's identity on an open pull request, or null when
 * the pull request does not need its attention.
 */
function attentionReason(ownVote: Vote | null, reviewerCount: number): { reason: string; status: string } | null {
  if (ownVote !== null) {
    if (ownVote > 0) return null;
    const status = ownVote === 0 ? "Not yet reviewed" : describeVote(ownVote);
    return { reason: `You need to review this PR (status: ${status})`, status };
  }
  if (reviewerCount === 0) {
    return { reason: "No reviewers assigned", status: "No reviewers" };
  }
  return null;
}

/**
 * Plain-text rendering of what post_review would publish.
 */
export function formatPreview(pullRequestId: number, title: string, finalized: FinalizedReview): string {
  const { verdict, consolidated, vote, summary } = finalized;
  const lines = [
    `REVIEW PREVIEW for PR #${pullRequestId}: ${title}`,
    `Vote: ${formatVote(vote)}`,
    `Severity: ${verdict.severity}`,
    `Approved: ${verdict.approved ? "yes" : "no"}`,
    "",
    `Line comments (${consolidated.byLocation.size}):`,
  ];
  for (const [key, comment] of consolidated.byLocation) {
    lines.push(`- ${key} [${comment.severity.toUpperCase()}]`);
    for (const contentLine of comment.content.split("\n")) {
      lines.push(`  ${contentLine}`);
    }
  }
  lines.push("", `General comments (${consolidated.general.length}):`);
  for (const comment of consolidated.general) {
    lines.push(`- [${comment.severity.toUpperCase()}] ${comment.content}`);
  }
  lines.push("", "--- Summary comment ---", summary);
  return lines.join("\n");
}

// ============================================================================
// Tools
// ============================================================================

const listPullRequests: ToolDefinition = {
  name: "list_pull_requests",
  description: "List pull requests of a repository filtered by status (active, completed, abandoned, all)",
  async run(params, { host }) {
    const repositoryId = requireString(params, "repository_id");
    const status = readStatus(params);
    const pullRequests = await host.listPullRequests(repositoryId, status);
    return { status, count: pullRequests.length, pull_requests: pullRequests };
  },
};

const listPrsNeedingMyReview: ToolDefinition = {
  name: "list_prs_needing_my_review",
  description: "List active pull requests still waiting on this reviewer's vote, or with no reviewers at all",
  async run(params, { host }) {
    const repositoryId = requireString(params, "repository_id");
    const pullRequests = await host.listPullRequests(repositoryId, "active");

    const needing: ReviewNeed[] = [];
    for (const pr of pullRequests) {
      const state = await host.getReviewerState(repositoryId, pr.id);
      const attention = attentionReason(state.ownVote, state.reviewerCount);
      if (!attention) continue;
      needing.push({
        id: pr.id,
        title: pr.title,
        author: pr.author,
        created_at: pr.created_at,
        source_branch: pr.source_branch,
        target_branch: pr.target_branch,
        reason: attention.reason,
        your_status: attention.status,
        is_reviewer: state.ownVote !== null,
      });
    }

    return {
      status: "success",
      count: needing.length,
      message: `Found ${needing.length} PR(s) needing your review`,
      pull_requests: needing,
    };
  },
};

const getPullRequest: ToolDefinition = {
  name: "get_pull_request",
  description: "Get the metadata of one pull request",
  async run(params, { host }) {
    const key = readPullRequestKey(params);
    const pullRequest = await host.getPullRequest(key.repositoryId, key.pullRequestId);
    return { status: "success", pull_request: pullRequest };
  },
};

const getPrForReview: ToolDefinition = {
  name: "get_pr_for_review",
  description: "Fetch a pull request, run the local analyses and return the assembled review context",
  async run(params, { host }) {
    const key = readPullRequestKey(params);
    const prepared = await prepareReview(host, key);
    return {
      status: "success",
      pr_id: key.pullRequestId,
      file_count: prepared.changes.length,
      file_types: Object.fromEntries(prepared.categories),
      package_analysis: prepared.dependencies.summary,
      security_analysis: {
        findings_count: prepared.security.findings.length,
        findings: prepared.security.findings,
        recommendations: prepared.security.recommendations,
      },
      review_context: prepared.context,
    };
  },
};

const previewReview: ToolDefinition = {
  name: "preview_review",
  description: "Show the comments, summary and vote a review verdict would publish, without posting",
  async run(params, { host }) {
    const key = readPullRequestKey(params);
    const rawVerdict = parseReviewJsonParam(params);
    const prepared = await prepareReview(host, key);
    return formatPreview(key.pullRequestId, prepared.metadata.title, finalizeReview(prepared, rawVerdict));
  },
};

const postReview: ToolDefinition = {
  name: "post_review",
  description: "Publish a review verdict (review_json) as line comments, a summary comment and a vote",
  async run(params, { host, ledger }) {
    const key = readPullRequestKey(params);
    const rawVerdict = parseReviewJsonParam(params);
    const prepared = await prepareReview(host, key);
    const finalized = finalizeReview(prepared, rawVerdict);
    const result = await publishFinalized(host, ledger, key, finalized);
    if (result.errors.length > 0) {
      log.warn("Some errors occurred during posting", { errors: result.errors });
    }
    return postingReport(key.pullRequestId, result, finalized);
  },
};

const reviewPullRequest: ToolDefinition = {
  name: "review_pull_request",
  description: "Review a pull request with the configured agent and publish the result",
  async run(params, { host, ledger, agent }) {
    if (!agent) {
      throw new Error("Reviewing agent not configured. Set REVIEW_AGENT_API_KEY.");
    }
    const key = readPullRequestKey(params);
    const { result, finalized } = await runReview({ host, ledger, agent, key });
    return postingReport(key.pullRequestId, result, finalized);
  },
};

const addPrComment: ToolDefinition = {
  name: "add_pr_comment",
  description: "Add a single comment to a pull request, on a line when file_path and line_number are given",
  async run(params, { host }) {
    const key = readPullRequestKey(params);
    const comment = requireString(params, "comment");
    const filePath = optionalString(params, "file_path");
    const line = optionalPositiveInt(params, "line_number");
    await host.createCommentThread(key, comment, filePath, filePath ? line : undefined);
    return `Comment added to PR #${key.pullRequestId}`;
  },
};

const setPrVote: ToolDefinition = {
  name: "set_pr_vote",
  description:
    "Set a vote on a pull request (approve, approve_with_suggestions, no_vote, wait_for_author, reject) with an optional comment",
  async run(params, { host }) {
    const key = readPullRequestKey(params);
    const { name, vote } = readVote(params);
    const comment = optionalString(params, "comment");

    await host.setVote(key, vote);
    if (comment) {
      await host.createCommentThread(key, `**Vote Updated: ${voteTitle(name)}**\n\n${comment}`);
    }

    const lines = [`Vote updated on PR #${key.pullRequestId}: ${voteTitle(name)}`, `Vote value: ${vote}`];
    if (comment) lines.push(`Comment added: ${comment}`);
    return lines.join("\n");
  },
};

const approvePullRequest: ToolDefinition = {
  name: "approve_pull_request",
  description: "Approve a pull request (requires confirm=true), with an optional comment",
  async run(params, { host }) {
    const key = readPullRequestKey(params);
    if (!optionalBoolean(params, "confirm", false)) {
      return confirmationRequired("approve", key);
    }
    const comment = optionalString(params, "comment");

    const pr = await host.getPullRequest(key.repositoryId, key.pullRequestId);
    await host.setVote(key, 10);
    if (comment) {
      await host.createCommentThread(key, `**PR Approved**\n\n${comment}`);
    }

    const lines = [
      `Approved PR #${key.pullRequestId}: ${pr.title}`,
      `Author: ${pr.author}`,
      `Target Branch: ${pr.target_branch}`,
    ];
    if (comment) lines.push(`Comment added: ${comment}`);
    return lines.join("\n");
  },
};

const rejectPullRequest: ToolDefinition = {
  name: "reject_pull_request",
  description:
    "Reject a pull request with a reason (requires confirm=true); require_changes=false waits for the author instead",
  async run(params, { host }) {
    const key = readPullRequestKey(params);
    if (!optionalBoolean(params, "confirm", false)) {
      return confirmationRequired("reject", key);
    }
    const reason = optionalString(params, "reason")?.trim() ?? "";
    if (reason.length < MIN_REJECTION_REASON) {
      throw new ToolParamError(
        `Please provide a detailed reason for rejection (at least ${MIN_REJECTION_REASON} characters)`
      );
    }
    const requireChanges = optionalBoolean(params, "require_changes", true);
    const vote: Vote = requireChanges ? -10 : -5;

    const pr = await host.getPullRequest(key.repositoryId, key.pullRequestId);
    await host.setVote(key, vote);
    await host.createCommentThread(
      key,
      [
        "## PR Rejected",
        "",
        `**Reason:** ${reason}`,
        "",
        `**Status:** ${requireChanges ? "Changes Required" : "Waiting for Author"}`,
        "",
        "Please address the issues mentioned above and update the PR.",
      ].join("\n")
    );

    return [
      `Rejected PR #${key.pullRequestId}: ${pr.title}`,
      `Author: ${pr.author}`,
      `Reason: ${reason}`,
      `Vote: ${formatVote(vote)}`,
    ].join("\n");
  },
};

export const TOOLS: readonly ToolDefinition[] = [
  listPullRequests,
  listPrsNeedingMyReview,
  getPullRequest,
  getPrForReview,
  previewReview,
  postReview,
  reviewPullRequest,
  addPrComment,
  setPrVote,
  approvePullRequest,
  rejectPullRequest,
];

const TOOLS_BY_NAME = new Map(TOOLS.map((tool) => [tool.name, tool]));

export function hasTool(name: string): boolean {
  return TOOLS_BY_NAME.has(name);
}

/**
 * Invoke a tool by name. Never rejects.
 */
export async function invokeTool(name: string, rawParams: unknown, ctx: ToolContext): Promise<ToolResult> {
  const tool = TOOLS_BY_NAME.get(name);
  if (!tool) {
    return `Error: Unknown tool: ${name}`;
  }

  try {
    const params = asParams(rawParams);
    return await tool.run(params, ctx);
  } catch (error) {
    log.error(`Tool ${name} failed`, { error: errorMessage(error) });
    return `Error: ${errorMessage(error)}`;
  }
}
