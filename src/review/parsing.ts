/**
 * JSON parsing, repair, and normalization of the reviewing agent's verdict.
 */

import { createLogger, errorMessage } from "../logger";
import { CommentSeverity, RawComment, ReviewVerdict, TestSuggestion, VerdictSeverity } from "./types";

const log = createLogger("Parser");

const VERDICT_SEVERITIES: VerdictSeverity[] = ["approved", "minor", "major", "critical"];
const COMMENT_SEVERITIES: CommentSeverity[] = ["info", "warning", "error"];

export function defaultVerdict(): ReviewVerdict {
  return {
    approved: false,
    severity: "minor",
    summary: "Review completed",
    comments: [],
    test_suggestions: [],
  };
}

export function unparseableVerdict(): ReviewVerdict {
  return { ...defaultVerdict(), summary: "Could not parse review response" };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCommentSeverity(value: unknown): value is CommentSeverity {
  return COMMENT_SEVERITIES.some((s) => s === value);
}

// ============================================================================
// Field Normalization
// ============================================================================

function normalizeSeverity(value: unknown): string {
  if (typeof value !== "string" || !value.trim()) {
    return "minor";
  }
  const lower = value.trim().toLowerCase();
  return VERDICT_SEVERITIES.some((s) => s === lower) ? lower : value;
}

function normalizeLineNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function normalizeComment(item: unknown): RawComment | null {
  if (!isRecord(item) || typeof item.content !== "string" || !item.content.trim()) {
    return null;
  }

  const comment: RawComment = {
    content: item.content,
    severity: isCommentSeverity(item.severity) ? item.severity : "info",
  };
  if (typeof item.file_path === "string" && item.file_path) {
    comment.file_path = item.file_path;
  }
  const line = normalizeLineNumber(item.line_number);
  if (line !== undefined) {
    comment.line_number = line;
  }
  if (typeof item.issue_type === "string" && item.issue_type) {
    comment.issue_type = item.issue_type;
  }
  return comment;
}

function normalizeSuggestion(item: unknown, groupPath?: string): TestSuggestion | null {
  if (!isRecord(item)) {
    return null;
  }

  const suggestion: TestSuggestion = {
    test_name: typeof item.test_name === "string" ? item.test_name : "",
    description: typeof item.description === "string" ? item.description : "",
    test_code: typeof item.test_code === "string" ? item.test_code : "",
  };
  const filePath = typeof item.file_path === "string" && item.file_path ? item.file_path : groupPath;
  if (filePath) {
    suggestion.file_path = filePath;
  }
  return suggestion;
}

/**
 * Flatten test suggestions given either as a list or grouped by file path.
 */
export function flattenTestSuggestions(value: unknown): TestSuggestion[] {
  const suggestions: TestSuggestion[] = [];

  if (Array.isArray(value)) {
    for (const item of value) {
      const suggestion = normalizeSuggestion(item);
      if (suggestion) suggestions.push(suggestion);
    }
  } else if (isRecord(value)) {
    for (const [filePath, group] of Object.entries(value)) {
      if (!Array.isArray(group)) continue;
      for (const item of group) {
        const suggestion = normalizeSuggestion(item, filePath);
        if (suggestion) suggestions.push(suggestion);
      }
    }
  }

  return suggestions;
}

/**
 * Normalize a raw verdict object. Never throws; missing or malformed fields
 * fall back to defaults.
 */
export function parseReviewResponse(raw: unknown): ReviewVerdict {
  if (!isRecord(raw)) {
    log.warn("Review response is not an object");
    return unparseableVerdict();
  }

  const comments: RawComment[] = [];
  if (Array.isArray(raw.comments)) {
    for (const item of raw.comments) {
      const comment = normalizeComment(item);
      if (comment) comments.push(comment);
    }
  }

  return {
    approved: raw.approved === true,
    severity: normalizeSeverity(raw.severity),
    summary: typeof raw.summary === "string" && raw.summary.trim() ? raw.summary : "Review completed",
    comments,
    test_suggestions: flattenTestSuggestions(raw.test_suggestions),
  };
}

// ============================================================================
// Text Extraction and Repair
// ============================================================================

/**
 * Attempt to repair a truncated JSON response.
 * Cuts the text after the last complete value and closes every bracket that
 * is still open.
 *
 * @returns Repaired JSON string or null if repair is not possible
 */
export function attemptJsonRepair(content: string): string | null {
  const start = content.indexOf("{");
  if (start === -1) {
    return null;
  }
  const json = content.slice(start);

  const stack: string[] = [];
  let inString = false;
  let escaped = false;
  let cut = -1;
  let open: string[] = [];

  for (let i = 0; i < json.length; i++) {
    const ch = json[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      stack.push(ch === "{" ? "}" : "]");
    } else if (ch === "}" || ch === "]") {
      stack.pop();
      if (stack.length === 0) {
        // Complete object; nothing to repair
        return null;
      }
      cut = i + 1;
      open = [...stack];
    } else if (ch === "," && stack.length > 0) {
      cut = i;
      open = [...stack];
    }
  }

  if (cut === -1) {
    return null;
  }
  return json.slice(0, cut) + open.reverse().join("");
}

/**
 * Extract a JSON object from free text, repairing truncated output.
 * Returns undefined when no object can be recovered.
 */
export function extractJsonObject(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  if (match) {
    try {
      return JSON.parse(match[0]);
    } catch {
      log.debug("Direct JSON parse failed, attempting repair");
    }
  }

  const repaired = attemptJsonRepair(text);
  if (repaired) {
    try {
      return JSON.parse(repaired);
    } catch (error) {
      log.warn("Repaired JSON still invalid", {
        error: errorMessage(error),
      });
    }
  }
  return undefined;
}
