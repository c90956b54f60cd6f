/**
 * Line-level scanner for credential and sensitive-data exposure.
 */

import { createLogger } from "../../logger";
import { Change, SecurityFinding } from "../../review/types";
import { isCommentLine } from "./comments";
import { LINE_DETECTORS, LineContext } from "./detectors";

const log = createLogger("Security");

export const SECURITY_RECOMMENDATIONS = [
  "IMMEDIATE: Remove all methods that expose, return, or reveal password information",
  "REQUIRED: Ensure passwords are only used for validation/comparison, never exposed",
  "POLICY: No password values should ever be accessible through any public interface",
  "SECURITY: Review all logging statements to ensure no sensitive data is logged",
  "REVIEW: Audit all sensitive data handling for proper encryption and access control",
  "SECURE: Move sensitive configuration to secure environment variables",
];

export interface SecurityScanResult {
  findings: SecurityFinding[];
  recommendations: string[];
}

/**
 * Scan one file's content. Produces at most one finding per line, carrying
 * every distinct message from the detectors that fired on it.
 */
export function scanFileSecurity(filePath: string, content: string): SecurityFinding[] {
  if (!content) {
    return [];
  }

  const findings: SecurityFinding[] = [];
  const lines = content.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const trimmed = line.trim();
    if (!trimmed || isCommentLine(trimmed, filePath)) {
      continue;
    }

    const collected: string[] = [];
    const base = {
      filePath,
      line,
      lower: line.toLowerCase(),
      trimmed,
      lineNumber: i + 1,
      lines,
    };
    for (const detector of LINE_DETECTORS) {
      const ctx: LineContext = { ...base, previous: collected };
      collected.push(...detector.detect(ctx));
    }

    if (collected.length === 0) {
      continue;
    }

    const unique = [...new Set(collected)];
    findings.push({
      file_path: filePath,
      line_number: i + 1,
      message: `CRITICAL SECURITY: ${unique.join(", ")}`,
      severity: "error",
      issue_type: "security",
      line_content: trimmed,
    });
    log.warn(`Security issues found at ${filePath}:${i + 1}`, { count: unique.length });
  }

  return findings;
}

export function securityRecommendations(findings: SecurityFinding[]): string[] {
  return findings.length > 0 ? [...SECURITY_RECOMMENDATIONS] : [];
}

/**
 * Scan the new content of every change in a pull request.
 */
export function scanChangesSecurity(changes: Change[]): SecurityScanResult {
  const findings: SecurityFinding[] = [];
  for (const change of changes) {
    if (change.new_content) {
      findings.push(...scanFileSecurity(change.path, change.new_content));
    }
  }
  return { findings, recommendations: securityRecommendations(findings) };
}
