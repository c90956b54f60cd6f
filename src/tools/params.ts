/**
 * Parameter readers for tool invocations.
 */

import { PullRequestKey, PullRequestStatus } from "../review/types";

export type ToolParams = Record<string, unknown>;

const STATUSES: PullRequestStatus[] = ["active", "completed", "abandoned", "all"];

export class ToolParamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolParamError";
  }
}

export function asParams(value: unknown): ToolParams {
  if (value === undefined || value === null) return {};
  if (typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  throw new ToolParamError("Parameters must be a JSON object");
}

export function requireString(params: ToolParams, name: string): string {
  const value = params[name];
  if (typeof value !== "string" || !value.trim()) {
    throw new ToolParamError(`Missing required parameter: ${name}`);
  }
  return value;
}

export function optionalString(params: ToolParams, name: string): string | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ToolParamError(`Parameter ${name} must be a string`);
  }
  return value || undefined;
}

function toPositiveInt(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const n = Number(value.trim());
    return n > 0 ? n : undefined;
  }
  return undefined;
}

export function requirePositiveInt(params: ToolParams, name: string): number {
  const n = toPositiveInt(params[name]);
  if (n === undefined) {
    throw new ToolParamError(`Parameter ${name} must be a positive integer`);
  }
  return n;
}

export function optionalPositiveInt(params: ToolParams, name: string): number | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  return requirePositiveInt(params, name);
}

export function optionalBoolean(params: ToolParams, name: string, fallback: boolean): boolean {
  const value = params[name];
  if (value === undefined || value === null) return fallback;
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new ToolParamError(`Parameter ${name} must be a boolean`);
}

export function readStatus(params: ToolParams): PullRequestStatus {
  const value = params.status;
  if (value === undefined || value === null || value === "") return "active";
  const match = STATUSES.find((s) => s === value);
  if (!match) {
    throw new ToolParamError(`Parameter status must be one of: ${STATUSES.join(", ")}`);
  }
  return match;
}

export function readPullRequestKey(params: ToolParams): PullRequestKey {
  return {
    repositoryId: requireString(params, "repository_id"),
    pullRequestId: requirePositiveInt(params, "pull_request_id"),
  };
}
