/**
 * Line detectors for the security scanner.
 *
 * Detectors run in registration order. Each one is a pure function of the
 * line context and returns zero or more messages for that line.
 */

import {
  CODE_FILE_EXTENSIONS,
  CONFIG_FILE_EXTENSIONS,
  LOGGING_KEYWORDS,
  PATTERN_TABLES,
  PatternTable,
  SECRET_WORDS,
  SENSITIVE_KEYWORDS,
  SQL_FILE_EXTENSIONS,
  hasExtension,
} from "./patterns";

export interface LineContext {
  filePath: string;
  /** The raw line as it appears in the file. */
  line: string;
  lower: string;
  trimmed: string;
  /** 1-based line number. */
  lineNumber: number;
  lines: readonly string[];
  /** Messages already produced for this line by earlier detectors. */
  previous: readonly string[];
}

export interface LineDetector {
  id: string;
  detect(ctx: LineContext): string[];
}

// ============================================================================
// Helpers
// ============================================================================

export function isLoggingStatement(lower: string): boolean {
  return LOGGING_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function containsSensitiveData(lower: string): boolean {
  return SENSITIVE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function mentionsSecret(lower: string): boolean {
  return SECRET_WORDS.some((word) => lower.includes(word));
}

/**
 * Whether `password` appears in the ten lines following a method header.
 */
function passwordInMethodBody(lines: readonly string[], lineNumber: number): boolean {
  const end = Math.min(lines.length, lineNumber + 10);
  for (let i = lineNumber; i < end; i++) {
    if (lines[i].toLowerCase().includes("password")) {
      return true;
    }
  }
  return false;
}

/**
 * A description overlapping an existing message by two or more words
 * describes the same problem.
 */
export function isDuplicateIssue(description: string, existing: readonly string[]): boolean {
  const keyWords = new Set(description.toLowerCase().split(/\s+/).filter(Boolean));
  return existing.some((message) => {
    const words = new Set(message.toLowerCase().split(/\s+/).filter(Boolean));
    let overlap = 0;
    for (const word of keyWords) {
      if (words.has(word)) overlap++;
    }
    return overlap >= 2;
  });
}

function tableDetector(table: PatternTable): LineDetector {
  return {
    id: table.id,
    detect(ctx) {
      const messages: string[] = [];
      for (const { pattern, description } of table.patterns) {
        if (!pattern.test(ctx.line)) continue;
        if (isDuplicateIssue(description, [...ctx.previous, ...messages])) continue;
        messages.push(`${table.label}: ${description}`);
      }
      return messages;
    },
  };
}

// ============================================================================
// Registered Detectors
// ============================================================================

const ACCESS_MODIFIERS = ["public", "private", "protected"];

const exposureMethod: LineDetector = {
  id: "exposure-method",
  detect: ({ lower }) =>
    lower.includes("revealpassword") && ACCESS_MODIFIERS.some((m) => lower.includes(m))
      ? ["CRITICAL: RevealPassword method exposes sensitive password information"]
      : [],
};

const passwordReturn: LineDetector = {
  id: "password-return",
  detect: ({ trimmed, lower }) =>
    trimmed.startsWith("return") && lower.includes("password")
      ? ["CRITICAL: Method returns password value directly"]
      : [],
};

const sensitiveLogging: LineDetector = {
  id: "sensitive-logging",
  detect: ({ lower }) =>
    isLoggingStatement(lower) && containsSensitiveData(lower)
      ? ["CRITICAL: Sensitive data logged - passwords/secrets should never be logged"]
      : [],
};

const toStringExposure: LineDetector = {
  id: "tostring-exposure",
  detect: ({ lower, lines, lineNumber }) =>
    lower.includes("tostring") &&
    (lower.includes("override") || lower.includes("public")) &&
    passwordInMethodBody(lines, lineNumber)
      ? ["CRITICAL: ToString method exposes password information"]
      : [],
};

const contextChecks: LineDetector = {
  id: "context",
  detect({ filePath, line, lower }) {
    const messages: string[] = [];

    if (hasExtension(filePath, CONFIG_FILE_EXTENSIONS)) {
      if (/["']\s*[a-zA-Z0-9+/=]{20,}\s*["']/.test(line) && mentionsSecret(lower)) {
        messages.push("CONFIGURATION LEAK: Sensitive value in configuration file");
      }
    }

    if (hasExtension(filePath, CODE_FILE_EXTENSIONS)) {
      if (/["'][A-Za-z0-9+/]{40,}={0,2}["']/.test(line) && mentionsSecret(lower)) {
        messages.push("ENCODED SECRET: Base64 encoded secret detected");
      }
      // Reading secrets from the environment is fine; logging them is not
      if (
        /environment\.(get|getenv|getenvironmentvariable)/.test(lower) &&
        mentionsSecret(lower) &&
        isLoggingStatement(lower)
      ) {
        messages.push("ENVIRONMENT LEAK: Environment variable with secret being logged");
      }
    }

    if (hasExtension(filePath, SQL_FILE_EXTENSIONS) && /(password|secret)\s*=/.test(lower)) {
      messages.push("SQL CREDENTIAL: Password or secret in SQL file");
    }

    return messages;
  },
};

export const LINE_DETECTORS: readonly LineDetector[] = [
  exposureMethod,
  passwordReturn,
  sensitiveLogging,
  toStringExposure,
  ...PATTERN_TABLES.map(tableDetector),
  contextChecks,
];
