/**
 * Folds locally detected problems into the agent's verdict.
 */

import { RawComment, ReviewVerdict, SecurityFinding } from "./types";

const SEVERITY_ORDER = ["approved", "minor", "major", "critical"];

/**
 * Raise a verdict's severity to at least `floor`. Unknown severities are
 * treated as below every known one.
 */
export function raiseSeverity(severity: string, floor: string): string {
  return SEVERITY_ORDER.indexOf(severity) >= SEVERITY_ORDER.indexOf(floor) ? severity : floor;
}

export function securityComment(finding: SecurityFinding): RawComment {
  return {
    file_path: finding.file_path,
    line_number: finding.line_number,
    content: finding.message,
    severity: finding.severity,
    issue_type: finding.issue_type,
  };
}

/**
 * Add security findings as line comments and dependency issues as general
 * comments. Any local problem blocks approval and makes the verdict at
 * least major. A finding the verdict already carries verbatim is not added
 * twice.
 */
export function mergeLocalFindings(
  verdict: ReviewVerdict,
  local: { securityFindings: SecurityFinding[]; dependencyIssues: string[] }
): ReviewVerdict {
  const existing = new Set(verdict.comments.map((c) => `${c.file_path ?? ""}:${c.line_number ?? ""}:${c.content}`));
  const added: RawComment[] = [];

  for (const finding of local.securityFindings) {
    const comment = securityComment(finding);
    const id = `${comment.file_path}:${comment.line_number}:${comment.content}`;
    if (!existing.has(id)) {
      existing.add(id);
      added.push(comment);
    }
  }
  for (const issue of local.dependencyIssues) {
    if (!existing.has(`::${issue}`)) {
      existing.add(`::${issue}`);
      added.push({ content: issue, severity: "error", issue_type: "dependency" });
    }
  }

  if (local.securityFindings.length === 0 && local.dependencyIssues.length === 0) {
    return verdict;
  }
  return {
    ...verdict,
    approved: false,
    severity: raiseSeverity(verdict.severity, "major"),
    comments: [...verdict.comments, ...added],
  };
}
