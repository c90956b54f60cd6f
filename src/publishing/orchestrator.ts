/**
 * Publishes a consolidated review to the hosting service.
 */

import { HostingClient, LineCommentRejectedError } from "../integrations/github/hosting";
import { createLogger, errorMessage } from "../logger";
import { ConsolidatedComment, PostingResult, PullRequestKey, Vote, formatPullRequestKey } from "../review/types";
import { PublicationLedger } from "./ledger";

const log = createLogger("Publisher");

export interface PublishParams {
  key: PullRequestKey;
  consolidated: Map<string, ConsolidatedComment> | ConsolidatedComment[];
  summary: string;
  vote: Vote;
}

/**
 * General comment standing in for a line comment the host refused.
 */
export function anchoredContent(filePath: string, line: number, content: string): string {
  return `**${filePath}:${line}**\n\n${content}`;
}

async function postLineComment(
  host: HostingClient,
  key: PullRequestKey,
  content: string,
  filePath: string,
  line: number
): Promise<void> {
  try {
    await host.createCommentThread(key, content, filePath, line);
  } catch (error) {
    if (!(error instanceof LineCommentRejectedError)) {
      throw error;
    }
    log.info(`Line ${filePath}:${line} is outside the diff, posting as a general comment`);
    await host.createCommentThread(key, anchoredContent(filePath, line, content));
  }
}

/**
 * Post line comments, the summary and the vote for one pull request.
 *
 * Each hosting call is independent: a failure is recorded in `errors` and the
 * remaining calls still run. A pull request is published at most once per
 * ledger; a second call reports `duplicate` without touching the host. The
 * ledger entry is released after any failure so the review can be retried.
 */
export async function publishReview(
  host: HostingClient,
  ledger: PublicationLedger,
  params: PublishParams
): Promise<PostingResult> {
  const { key, summary, vote } = params;
  const id = formatPullRequestKey(key);

  if (!ledger.tryReserve(key)) {
    log.info(`Review already published for ${id}, skipping`);
    return { comments_posted: 0, vote_updated: false, errors: [], duplicate: true };
  }

  const comments = Array.isArray(params.consolidated)
    ? params.consolidated
    : [...params.consolidated.values()];
  const errors: string[] = [];
  let commentsPosted = 0;
  let voteUpdated = false;

  for (const comment of comments) {
    if (!comment.location) continue;
    const { file_path, line_number } = comment.location;
    try {
      await postLineComment(host, key, comment.content, file_path, line_number);
      commentsPosted++;
    } catch (error) {
      errors.push(`Failed to post comment at ${file_path}:${line_number}: ${errorMessage(error)}`);
    }
  }

  try {
    await host.createCommentThread(key, summary);
  } catch (error) {
    errors.push(`Failed to post summary: ${errorMessage(error)}`);
  }

  try {
    await host.setVote(key, vote);
    voteUpdated = true;
  } catch (error) {
    errors.push(`Failed to update vote: ${errorMessage(error)}`);
  }

  if (errors.length === 0) {
    ledger.commit(key);
    log.info(`Published review for ${id}`, { comments: commentsPosted, vote });
  } else {
    ledger.release(key);
    log.warn(`Review for ${id} published with errors`, { errors: errors.length, comments: commentsPosted });
  }

  return { comments_posted: commentsPosted, vote_updated: voteUpdated, errors, duplicate: false };
}
