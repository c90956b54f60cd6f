/**
 * File content fetching from the contents API.
 */

import { Octokit } from "octokit";
import { createLogger, errorMessage } from "../../logger";
import { httpStatus } from "./client";

const log = createLogger("GitHub");

export const MAX_FILE_SIZE_BYTES = 500 * 1024;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Content with NUL bytes is treated as binary.
 */
export function looksBinary(content: string): boolean {
  return content.includes("\u0000");
}

/**
 * Fetch the raw content of a file from the repository at a specific ref.
 * Enforces a size limit to prevent memory issues with large files.
 *
 * @returns The file content as a string, or null if not found/too large/binary/error
 */
export async function fetchFileContent(
  octokit: Octokit,
  owner: string,
  repo: string,
  path: string,
  ref: string
): Promise<string | null> {
  try {
    log.debug(`Fetching file content: ${path} @ ${ref.slice(0, 7)}`);
    const response = await octokit.request("GET /repos/{owner}/{repo}/contents/{path}", {
      owner,
      repo,
      path,
      ref,
    });

    // Directories come back as arrays
    const data: unknown = response.data;
    if (!isRecord(data) || data.type !== "file") {
      log.debug(`${path} is not a file`);
      return null;
    }

    if (typeof data.size === "number" && data.size > MAX_FILE_SIZE_BYTES) {
      log.warn(`Skipping large file: ${path} (${Math.round(data.size / 1024)}KB)`);
      return null;
    }

    if (typeof data.content !== "string" || !data.content) {
      log.debug(`${path} has no content`);
      return null;
    }

    // GitHub returns base64-encoded content for files
    const content = Buffer.from(data.content, "base64").toString("utf-8");

    if (content.length > MAX_FILE_SIZE_BYTES || looksBinary(content)) {
      log.warn(`Skipping large or binary file after decode: ${path}`);
      return null;
    }

    return content;
  } catch (error) {
    if (httpStatus(error) === 404) {
      log.debug(`File not found: ${path} @ ${ref.slice(0, 7)}`);
    } else {
      log.warn(`Error fetching ${path}`, { error: errorMessage(error) });
    }
    return null;
  }
}
