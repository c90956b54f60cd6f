/**
 * Pull request hosting client: the interface the review pipeline consumes,
 * and its GitHub implementation.
 */

import { Octokit } from "octokit";
import { isTestFile } from "../../analysis/classifier";
import { LoadedConfig } from "../../config/loader";
import { createLogger } from "../../logger";
import {
  Change,
  ChangeType,
  PullRequestKey,
  PullRequestMetadata,
  PullRequestStatus,
  PullRequestSummary,
  ReviewerState,
  Vote,
} from "../../review/types";
import { describeVote } from "../../review/vote";
import { appBotLogin, createInstallationOctokit, findInstallationForRepo, httpStatus, parseRepositoryId } from "./client";
import { fetchRepoConfig } from "./config";
import { fetchFileContent } from "./files";

const log = createLogger("GitHub");

export type ThreadId = number;

/**
 * The host refused to anchor a comment on a line, typically because the
 * line is not part of the pull request's diff.
 */
export class LineCommentRejectedError extends Error {
  readonly filePath: string;
  readonly line: number;

  constructor(filePath: string, line: number, reason: string) {
    super(`Cannot comment on ${filePath}:${line}: ${reason}`);
    this.name = "LineCommentRejectedError";
    this.filePath = filePath;
    this.line = line;
  }
}

export interface HostingClient {
  listPullRequests(repositoryId: string, status: PullRequestStatus): Promise<PullRequestSummary[]>;
  getPullRequest(repositoryId: string, pullRequestId: number): Promise<PullRequestMetadata>;
  /** Changed files across the PR's commits, deduplicated by path and sorted by path. */
  getPullRequestChanges(repositoryId: string, pullRequestId: number): Promise<Change[]>;
  /**
   * General comment when filePath or line is missing, line comment otherwise.
   * Rejects with LineCommentRejectedError when the line cannot take a comment.
   */
  createCommentThread(key: PullRequestKey, content: string, filePath?: string, line?: number): Promise<ThreadId>;
  setVote(key: PullRequestKey, vote: Vote): Promise<void>;
  getReviewerState(repositoryId: string, pullRequestId: number): Promise<ReviewerState>;
  /** Review configuration from the pull request's base branch. */
  getReviewConfig(key: PullRequestKey): Promise<LoadedConfig>;
}

// ============================================================================
// Mapping
// ============================================================================

type GitHubState = "open" | "closed" | "all";

const STATE_FOR_STATUS: Record<PullRequestStatus, GitHubState> = {
  active: "open",
  completed: "closed",
  abandoned: "closed",
  all: "all",
};

export type ReviewEvent = "APPROVE" | "REQUEST_CHANGES" | "COMMENT";

export function reviewEventForVote(vote: Vote): ReviewEvent {
  if (vote > 0) return "APPROVE";
  if (vote < 0) return "REQUEST_CHANGES";
  return "COMMENT";
}

export function changeTypeForStatus(status: string): ChangeType {
  if (status === "added") return "add";
  if (status === "removed") return "delete";
  return "edit";
}

function statusOf(pr: { state: string; merged_at: string | null }): string {
  if (pr.state === "open") return "active";
  return pr.merged_at ? "completed" : "abandoned";
}

const VOTE_IN_REVIEW_BODY = /\((-?\d+)\)\s*$/;

function isVote(value: number): value is Vote {
  return value === 10 || value === 5 || value === 0 || value === -5 || value === -10;
}

/**
 * Vote carried by one of our own reviews: the value written by setVote when
 * present, else derived from the review state.
 */
export function voteFromReview(review: { state: string; body: string | null }): Vote | null {
  const match = review.body ? VOTE_IN_REVIEW_BODY.exec(review.body) : null;
  if (match) {
    const value = Number(match[1]);
    if (isVote(value)) return value;
  }
  if (review.state === "APPROVED") return 10;
  if (review.state === "CHANGES_REQUESTED") return -10;
  if (review.state === "COMMENTED") return 0;
  return null;
}

function isMergeCommit(commit: { parents: unknown[]; commit: { message: string } }): boolean {
  return commit.parents.length > 1 || commit.commit.message.toLowerCase().includes("merge");
}

// ============================================================================
// GitHub Implementation
// ============================================================================

export type OctokitResolver = (owner: string, repo: string) => Promise<Octokit>;

export class GitHubHostingClient implements HostingClient {
  private readonly resolveOctokit: OctokitResolver;
  private readonly resolveOwnLogin: () => Promise<string>;

  constructor(resolveOctokit: OctokitResolver, resolveOwnLogin: () => Promise<string> = appBotLogin) {
    this.resolveOctokit = resolveOctokit;
    this.resolveOwnLogin = resolveOwnLogin;
  }

  private async connect(repositoryId: string): Promise<{ octokit: Octokit; owner: string; repo: string }> {
    const { owner, repo } = parseRepositoryId(repositoryId);
    const octokit = await this.resolveOctokit(owner, repo);
    return { octokit, owner, repo };
  }

  private async fetchPull(repositoryId: string, pullRequestId: number) {
    const { octokit, owner, repo } = await this.connect(repositoryId);
    const response = await octokit.request("GET /repos/{owner}/{repo}/pulls/{pull_number}", {
      owner,
      repo,
      pull_number: pullRequestId,
    });
    return { octokit, owner, repo, pr: response.data };
  }

  async listPullRequests(repositoryId: string, status: PullRequestStatus): Promise<PullRequestSummary[]> {
    const { octokit, owner, repo } = await this.connect(repositoryId);
    const pulls = await octokit.paginate("GET /repos/{owner}/{repo}/pulls", {
      owner,
      repo,
      state: STATE_FOR_STATUS[status],
      per_page: 100,
    });

    return pulls
      .map((pr) => ({
        id: pr.number,
        title: pr.title,
        author: pr.user?.login ?? "unknown",
        status: statusOf(pr),
        source_branch: pr.head.ref,
        target_branch: pr.base.ref,
        created_at: pr.created_at,
      }))
      .filter((pr) => status === "all" || status === "active" || pr.status === status);
  }

  async getPullRequest(repositoryId: string, pullRequestId: number): Promise<PullRequestMetadata> {
    const { pr } = await this.fetchPull(repositoryId, pullRequestId);
    return {
      id: pr.number,
      title: pr.title,
      description: pr.body ?? "",
      source_branch: pr.head.ref,
      target_branch: pr.base.ref,
      author: pr.user?.login ?? "unknown",
      status: statusOf(pr),
    };
  }

  async getPullRequestChanges(repositoryId: string, pullRequestId: number): Promise<Change[]> {
    const { octokit, owner, repo, pr } = await this.fetchPull(repositoryId, pullRequestId);

    const commits = await octokit.paginate("GET /repos/{owner}/{repo}/pulls/{pull_number}/commits", {
      owner,
      repo,
      pull_number: pullRequestId,
      per_page: 100,
    });
    const regular = commits.filter((c) => !isMergeCommit(c));
    const toScan = regular.length > 0 ? regular : commits;
    log.info(`Scanning ${toScan.length} of ${commits.length} commits`, { repositoryId, pullRequestId });

    const seen = new Set<string>();
    const changes: Change[] = [];

    for (const commit of toScan) {
      const detail = await octokit.request("GET /repos/{owner}/{repo}/commits/{ref}", {
        owner,
        repo,
        ref: commit.sha,
      });

      for (const file of detail.data.files ?? []) {
        if (seen.has(file.filename)) continue;
        seen.add(file.filename);

        const changeType = changeTypeForStatus(file.status);
        const originalPath = file.previous_filename;
        const newContent =
          changeType === "delete"
            ? null
            : await fetchFileContent(octokit, owner, repo, file.filename, commit.sha);
        const oldContent =
          changeType === "edit"
            ? await fetchFileContent(octokit, owner, repo, originalPath ?? file.filename, pr.base.ref)
            : null;

        const change: Change = {
          path: file.filename,
          change_type: changeType,
          old_content: oldContent ?? "",
          new_content: newContent ?? "",
          is_test_file: isTestFile(file.filename),
        };
        if (originalPath) {
          change.original_path = originalPath;
        }
        changes.push(change);
      }
    }

    return changes.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  async createCommentThread(
    key: PullRequestKey,
    content: string,
    filePath?: string,
    line?: number
  ): Promise<ThreadId> {
    if (filePath && line !== undefined && line > 0) {
      const { octokit, owner, repo, pr } = await this.fetchPull(key.repositoryId, key.pullRequestId);
      try {
        const response = await octokit.request("POST /repos/{owner}/{repo}/pulls/{pull_number}/comments", {
          owner,
          repo,
          pull_number: key.pullRequestId,
          body: content,
          commit_id: pr.head.sha,
          path: filePath,
          line,
          side: "RIGHT",
        });
        return response.data.id;
      } catch (error) {
        // 422: the line is outside the diff of the head commit
        if (httpStatus(error) === 422) {
          throw new LineCommentRejectedError(filePath, line, error instanceof Error ? error.message : String(error));
        }
        throw error;
      }
    }

    const { octokit, owner, repo } = await this.connect(key.repositoryId);
    const response = await octokit.request("POST /repos/{owner}/{repo}/issues/{issue_number}/comments", {
      owner,
      repo,
      issue_number: key.pullRequestId,
      body: content,
    });
    return response.data.id;
  }

  async setVote(key: PullRequestKey, vote: Vote): Promise<void> {
    const { octokit, owner, repo } = await this.connect(key.repositoryId);
    await octokit.request("POST /repos/{owner}/{repo}/pulls/{pull_number}/reviews", {
      owner,
      repo,
      pull_number: key.pullRequestId,
      event: reviewEventForVote(vote),
      body: `Automated review vote: ${describeVote(vote)} (${vote})`,
    });
  }

  async getReviewerState(repositoryId: string, pullRequestId: number): Promise<ReviewerState> {
    const { octokit, owner, repo, pr } = await this.fetchPull(repositoryId, pullRequestId);
    const [ownLogin, reviews] = await Promise.all([
      this.resolveOwnLogin(),
      octokit.paginate("GET /repos/{owner}/{repo}/pulls/{pull_number}/reviews", {
        owner,
        repo,
        pull_number: pullRequestId,
        per_page: 100,
      }),
    ]);

    const reviewers = new Set<string>();
    for (const user of pr.requested_reviewers ?? []) reviewers.add(user.login);
    for (const team of pr.requested_teams ?? []) reviewers.add(`team:${team.slug}`);

    let ownVote: Vote | null = null;
    // Reviews come oldest first; the latest of ours counts
    for (const review of reviews) {
      const login = review.user?.login;
      if (!login) continue;
      reviewers.add(login);
      if (login === ownLogin) {
        ownVote = voteFromReview(review) ?? ownVote;
      }
    }

    return { reviewerCount: reviewers.size, ownVote };
  }

  async getReviewConfig(key: PullRequestKey): Promise<LoadedConfig> {
    const { octokit, owner, repo, pr } = await this.fetchPull(key.repositoryId, key.pullRequestId);
    return fetchRepoConfig((path, ref) => fetchFileContent(octokit, owner, repo, path, ref), pr.base.ref);
  }
}

/**
 * A hosting client that authenticates as the GitHub App installation of
 * each repository it is asked about.
 */
export function createGitHubHostingClient(): GitHubHostingClient {
  const clients = new Map<string, Octokit>();

  return new GitHubHostingClient(async (owner, repo) => {
    const id = `${owner}/${repo}`;
    const cached = clients.get(id);
    if (cached) {
      return cached;
    }
    const installationId = await findInstallationForRepo(owner, repo);
    if (!installationId) {
      throw new Error(`GitHub App is not installed on ${id}`);
    }
    const octokit = createInstallationOctokit(installationId);
    clients.set(id, octokit);
    return octokit;
  });
}
