/**
 * Merges raw review comments by exact file location.
 */

import { CommentLocation, CommentSeverity, ConsolidatedComment, RawComment } from "./types";

const SEVERITY_RANK: Record<CommentSeverity, number> = { info: 0, warning: 1, error: 2 };

export interface ConsolidatedComments {
  /** Comments without a usable location; they go into the summary. */
  general: RawComment[];
  /** Keyed by "path:line", in order of first appearance. */
  byLocation: Map<string, ConsolidatedComment>;
}

export function maxSeverity(severities: CommentSeverity[]): CommentSeverity {
  return severities.reduce<CommentSeverity>(
    (max, s) => (SEVERITY_RANK[s] > SEVERITY_RANK[max] ? s : max),
    "info"
  );
}

/**
 * Where a comment can be anchored; null for general comments.
 */
function locationOf(comment: RawComment): CommentLocation | null {
  const { file_path: filePath, line_number: line } = comment;
  if (!filePath || line === undefined || line <= 0) {
    return null;
  }
  return { file_path: filePath, line_number: line };
}

function mergeGroup(group: RawComment[]): { content: string; severity: CommentSeverity } {
  if (group.length === 1) {
    const [only] = group;
    return { content: `**[${only.severity.toUpperCase()}]**: ${only.content}`, severity: only.severity };
  }

  const severity = maxSeverity(group.map((c) => c.severity));
  const lines = [`**[${severity.toUpperCase()}]**: Multiple issues found:`];
  for (const comment of group) {
    lines.push(`• [${comment.severity.toUpperCase()}] ${comment.content}`);
  }
  return { content: lines.join("\n"), severity };
}

export function consolidateComments(comments: RawComment[]): ConsolidatedComments {
  const general: RawComment[] = [];
  const groups = new Map<string, { location: CommentLocation; comments: RawComment[] }>();

  for (const comment of comments) {
    const location = locationOf(comment);
    if (!location) {
      general.push(comment);
      continue;
    }

    const key = `${location.file_path}:${location.line_number}`;
    const group = groups.get(key);
    if (group) {
      group.comments.push(comment);
    } else {
      groups.set(key, { location, comments: [comment] });
    }
  }

  const byLocation = new Map<string, ConsolidatedComment>();
  for (const [key, group] of groups) {
    const merged = mergeGroup(group.comments);
    byLocation.set(key, {
      location: group.location,
      content: merged.content,
      severity: merged.severity,
    });
  }

  return { general, byLocation };
}
