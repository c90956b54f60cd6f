/**
 * GitHub API client creation and authentication.
 */

import { Octokit } from "octokit";
import { createAppAuth } from "@octokit/auth-app";
import { config } from "../../env";

function requireAppCredentials(): { appId: number; privateKey: string } {
  if (!config.GITHUB_APP_ID || !config.GITHUB_PRIVATE_KEY) {
    throw new Error("GITHUB_APP_ID or GITHUB_PRIVATE_KEY not set in config");
  }
  return { appId: Number(config.GITHUB_APP_ID), privateKey: config.GITHUB_PRIVATE_KEY };
}

/**
 * Create an Octokit client authenticated as an installation.
 */
export function createInstallationOctokit(installationId: number): Octokit {
  return new Octokit({
    authStrategy: createAppAuth,
    auth: { ...requireAppCredentials(), installationId },
  });
}

/**
 * Create an App-authenticated Octokit for finding installations.
 */
export function createAppOctokit(): Octokit {
  return new Octokit({
    authStrategy: createAppAuth,
    auth: requireAppCredentials(),
  });
}

let botLogin: Promise<string> | undefined;

/**
 * Login the App's installations act under, e.g. "diffwarden[bot]".
 */
export function appBotLogin(): Promise<string> {
  if (!botLogin) {
    botLogin = createAppOctokit()
      .request("GET /app")
      .then((response) => {
        const slug = response.data?.slug;
        if (!slug) {
          throw new Error("GitHub App has no slug");
        }
        return `${slug}[bot]`;
      });
    // Do not cache a failed lookup
    botLogin.catch(() => {
      botLogin = undefined;
    });
  }
  return botLogin;
}

/**
 * HTTP status carried by an Octokit request error, if any.
 */
export function httpStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

/**
 * Find the installation ID for a repository.
 */
export async function findInstallationForRepo(owner: string, repo: string): Promise<number | null> {
  try {
    const appOctokit = createAppOctokit();
    const response = await appOctokit.request("GET /repos/{owner}/{repo}/installation", {
      owner,
      repo,
    });
    return response.data.id;
  } catch (error) {
    if (httpStatus(error) === 404) {
      return null; // App not installed on this repo
    }
    throw error;
  }
}

/**
 * Split "owner/name" into its parts.
 */
export function parseRepositoryId(repositoryId: string): { owner: string; repo: string } {
  const match = /^([^/\s]+)\/([^/\s]+)$/.exec(repositoryId.trim());
  if (!match) {
    throw new Error(`Invalid repository id "${repositoryId}", expected owner/name`);
  }
  return { owner: match[1], repo: match[2] };
}
