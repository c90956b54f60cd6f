/**
 * The end-to-end review pipeline for one pull request.
 */

import { FileCategory } from "../analysis/categories";
import { analyzeFileSet } from "../analysis/classifier";
import { DependencyAnalysis, analyzeDependencies } from "../analysis/dependencies/analyzer";
import { SecurityScanResult, scanChangesSecurity } from "../analysis/security/scanner";
import { LoadedConfig } from "../config/loader";
import { ReviewAgent } from "../integrations/agent/agent";
import { HostingClient } from "../integrations/github/hosting";
import { createLogger } from "../logger";
import { PublicationLedger } from "../publishing/ledger";
import { publishReview } from "../publishing/orchestrator";
import { formatReviewSummary } from "../publishing/summary";
import { buildReviewContext } from "./assembler";
import { ConsolidatedComments, consolidateComments } from "./consolidation";
import { mergeLocalFindings } from "./findings";
import { parseReviewResponse } from "./parsing";
import {
  Change,
  PostingResult,
  PullRequestKey,
  PullRequestMetadata,
  ReviewVerdict,
  Vote,
  formatPullRequestKey,
} from "./types";
import { applyPolicyOutcome, decideVote, evaluateTestPolicy } from "./vote";

const log = createLogger("Pipeline");

export interface PreparedReview {
  key: PullRequestKey;
  metadata: PullRequestMetadata;
  changes: Change[];
  config: LoadedConfig;
  categories: Map<FileCategory, string[]>;
  dependencies: DependencyAnalysis;
  security: SecurityScanResult;
  context: string;
}

export interface FinalizedReview {
  verdict: ReviewVerdict;
  consolidated: ConsolidatedComments;
  vote: Vote;
  summary: string;
}

/**
 * Fetch a pull request, run the local analyses and assemble the review context.
 */
export async function prepareReview(host: HostingClient, key: PullRequestKey): Promise<PreparedReview> {
  const [metadata, changes, config] = await Promise.all([
    host.getPullRequest(key.repositoryId, key.pullRequestId),
    host.getPullRequestChanges(key.repositoryId, key.pullRequestId),
    host.getReviewConfig(key),
  ]);

  const scanned = changes.filter((change) => !config.isFileIgnored(change.path));
  if (scanned.length < changes.length) {
    log.info(`Excluding ${changes.length - scanned.length} ignored file(s) from scanning`);
  }

  const categories = analyzeFileSet(changes);
  const dependencies = analyzeDependencies(scanned);
  const security = scanChangesSecurity(scanned);

  const context = buildReviewContext({
    metadata,
    changes,
    categories,
    dependencySummary: dependencies.summary,
    securityFindings: security.findings,
    customInstructions: config.customInstructions,
    limits: {
      maxDiffLines: config.review.max_diff_lines,
      maxAddedChars: config.review.max_added_chars,
    },
  });

  log.info(`Prepared review for ${formatPullRequestKey(key)}`, {
    files: changes.length,
    securityFindings: security.findings.length,
    packages: dependencies.summary.total_packages_examined,
  });

  return { key, metadata, changes, config, categories, dependencies, security, context };
}

/**
 * Turn a raw verdict into the comments, vote and summary to publish.
 */
export function finalizeReview(prepared: PreparedReview, rawVerdict: unknown): FinalizedReview {
  const parsed = parseReviewResponse(rawVerdict);

  const violation = evaluateTestPolicy({
    metadata: prepared.metadata,
    categories: prepared.categories,
    changes: prepared.changes,
    policy: {
      requireTestsForBugFixes: prepared.config.policy.require_tests_for_bug_fixes,
      bugFixKeywords: prepared.config.policy.bug_fix_keywords,
    },
  });

  const verdict = mergeLocalFindings(applyPolicyOutcome(parsed, violation), {
    securityFindings: prepared.security.findings,
    dependencyIssues: prepared.dependencies.issues,
  });

  const consolidated = consolidateComments(verdict.comments);
  const vote = decideVote(verdict.approved, verdict.severity);
  const summary = formatReviewSummary({
    verdict,
    general: consolidated.general,
    vote,
    dependencySummary: prepared.dependencies.summary,
  });

  return { verdict, consolidated, vote, summary };
}

export async function publishFinalized(
  host: HostingClient,
  ledger: PublicationLedger,
  key: PullRequestKey,
  finalized: FinalizedReview
): Promise<PostingResult> {
  return publishReview(host, ledger, {
    key,
    consolidated: finalized.consolidated.byLocation,
    summary: finalized.summary,
    vote: finalized.vote,
  });
}

export interface ReviewRun {
  result: PostingResult;
  finalized: FinalizedReview | null;
}

/**
 * Review a pull request with the agent and publish the outcome.
 * Already published pull requests are reported as duplicates before the
 * agent is called.
 */
export async function runReview(deps: {
  host: HostingClient;
  ledger: PublicationLedger;
  agent: ReviewAgent;
  key: PullRequestKey;
}): Promise<ReviewRun> {
  const { host, ledger, agent, key } = deps;

  if (ledger.has(key) || ledger.isPending(key)) {
    log.info(`Review already published for ${formatPullRequestKey(key)}, skipping`);
    return {
      result: { comments_posted: 0, vote_updated: false, errors: [], duplicate: true },
      finalized: null,
    };
  }

  const prepared = await prepareReview(host, key);
  const rawVerdict = await agent.review(prepared.context, {
    model: prepared.config.agent.model ?? undefined,
    temperature: prepared.config.agent.temperature,
    maxTokens: prepared.config.agent.max_tokens,
  });

  const finalized = finalizeReview(prepared, rawVerdict);
  const result = await publishFinalized(host, ledger, key, finalized);
  return { result, finalized };
}
