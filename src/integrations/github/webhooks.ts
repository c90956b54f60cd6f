/**
 * GitHub webhook event handlers.
 */

import { Webhooks } from "@octokit/webhooks";
import { config } from "../../env";
import { createLogger, errorMessage } from "../../logger";
import { PublicationLedger } from "../../publishing/ledger";
import { runReview } from "../../review/pipeline";
import { PostingResult } from "../../review/types";
import { ReviewAgent } from "../agent/agent";
import { createInstallationOctokit } from "./client";
import { GitHubHostingClient, HostingClient } from "./hosting";

const log = createLogger("GitHub App");

export const webhooks = new Webhooks({
  secret: config.GITHUB_WEBHOOK_SECRET || "development-secret",
});

export const REVIEW_ACTIONS = new Set(["opened", "reopened", "synchronize", "ready_for_review"]);

export interface PullRequestEventInfo {
  action: string;
  installationId?: number;
  owner: string;
  repo: string;
  pullNumber: number;
  draft: boolean;
}

export interface WebhookDeps {
  ledger: PublicationLedger;
  agent: ReviewAgent | null;
  hostForInstallation(installationId: number): HostingClient;
}

export function hostForInstallation(installationId: number): HostingClient {
  const octokit = createInstallationOctokit(installationId);
  return new GitHubHostingClient(async () => octokit);
}

/**
 * Review a pull request in response to an event.
 * Resolves to null when the event does not call for a review. Pipeline
 * errors are logged and resolve to null so one pull request cannot affect
 * another.
 */
export async function handlePullRequestEvent(
  event: PullRequestEventInfo,
  deps: WebhookDeps
): Promise<PostingResult | null> {
  const repositoryId = `${event.owner}/${event.repo}`;

  if (!REVIEW_ACTIONS.has(event.action)) {
    return null;
  }
  if (event.draft) {
    log.info(`Skipping draft PR #${event.pullNumber} in ${repositoryId}`);
    return null;
  }
  if (!event.installationId) {
    log.warn("No installation ID found in payload, skipping review");
    return null;
  }
  if (!deps.agent) {
    log.warn("Reviewing agent not configured, skipping review");
    return null;
  }

  try {
    const host = deps.hostForInstallation(event.installationId);
    const { result } = await runReview({
      host,
      ledger: deps.ledger,
      agent: deps.agent,
      key: { repositoryId, pullRequestId: event.pullNumber },
    });
    log.info(`Review finished for ${repositoryId}#${event.pullNumber}`, {
      duplicate: result.duplicate,
      comments: result.comments_posted,
      errors: result.errors.length,
    });
    return result;
  } catch (error) {
    log.error(`Review failed for ${repositoryId}#${event.pullNumber}`, { error: errorMessage(error) });
    return null;
  }
}

export function registerEventHandlers(deps: WebhookDeps): void {
  webhooks.on("pull_request", async ({ id, name, payload }) => {
    log.info(`Received ${name} event (id: ${id}): ${payload.action}`);

    await handlePullRequestEvent(
      {
        action: payload.action,
        installationId: payload.installation?.id,
        owner: payload.repository.owner.login,
        repo: payload.repository.name,
        pullNumber: payload.number,
        draft: payload.pull_request.draft ?? false,
      },
      deps
    );
  });
}
