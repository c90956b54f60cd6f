/**
 * Assembles the review context handed to the reviewing agent.
 */

import { DOMINANT_PRIORITY, FileCategory, categoryTitle } from "../analysis/categories";
import { dominantOf, isMixed } from "../analysis/classifier";
import {
  Change,
  DependencySummary,
  PullRequestMetadata,
  SecurityFinding,
} from "./types";
import { DEFAULT_INSTRUCTIONS, RESPONSE_FORMAT, condensedGuidelines, instructionsFor } from "./prompts";

export const DEFAULT_MAX_DIFF_LINES = 500;
export const DEFAULT_MAX_ADDED_CHARS = 10000;

const MAX_VULNERABLE_LISTED = 5;
const MAX_FINDINGS_PER_FILE = 10;

export interface ContextLimits {
  maxDiffLines: number;
  maxAddedChars: number;
}

// ============================================================================
// Diff
// ============================================================================

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Line-aligned diff: line i of the old content is compared with line i of the
 * new content. Not a minimal edit script.
 */
export function buildSimpleDiff(
  oldContent: string,
  newContent: string,
  maxLines: number = DEFAULT_MAX_DIFF_LINES
): string {
  const oldLines = splitLines(oldContent);
  const newLines = splitLines(newContent);
  const total = Math.max(oldLines.length, newLines.length);
  const out: string[] = [];

  for (let i = 0; i < Math.min(total, maxLines); i++) {
    const hasOld = i < oldLines.length;
    const hasNew = i < newLines.length;
    if (hasOld && hasNew) {
      if (oldLines[i] !== newLines[i]) {
        out.push(`- ${oldLines[i]}`);
        out.push(`+ ${newLines[i]}`);
      } else {
        out.push(`  ${oldLines[i]}`);
      }
    } else if (hasOld) {
      out.push(`- ${oldLines[i]}`);
    } else {
      out.push(`+ ${newLines[i]}`);
    }
  }

  if (total > maxLines) {
    out.push("... (diff truncated)");
  }
  return out.join("\n");
}

// ============================================================================
// Instructions
// ============================================================================

function combinedInstructions(categories: Map<FileCategory, string[]>): string {
  const parts = [
    "# Multi-Type Code Review\n",
    "This PR contains multiple file types. Review each according to its specific requirements.\n\n",
    "## Files by Type:\n",
  ];

  for (const [category, files] of categories) {
    if (files.length > 0) {
      parts.push(`- **${category}**: ${files.length} file(s)\n`);
    }
  }

  parts.push("\n## Review Guidelines:\n\n");
  for (const category of DOMINANT_PRIORITY) {
    const files = categories.get(category);
    if (files && files.length > 0) {
      parts.push(`### ${categoryTitle(category)} Files:\n`);
      parts.push(condensedGuidelines(category));
      parts.push("\n");
    }
  }

  parts.push(RESPONSE_FORMAT);
  return parts.join("");
}

/**
 * Select the instruction text for a categorized change set.
 * Custom instructions always win.
 */
export function getReviewInstructions(
  categories: Map<FileCategory, string[]>,
  customInstructions?: string
): string {
  if (customInstructions && customInstructions.trim()) {
    return customInstructions;
  }
  if (categories.size === 0) {
    return DEFAULT_INSTRUCTIONS;
  }
  if (isMixed(categories)) {
    return combinedInstructions(categories);
  }
  return instructionsFor(dominantOf(categories));
}

// ============================================================================
// Context Sections
// ============================================================================

function dependencySection(summary: DependencySummary): string[] {
  const lines = ["", "### Dependency Summary:", `- Packages examined: ${summary.total_packages_examined}`];
  for (const [ecosystem, count] of Object.entries(summary.packages_by_type)) {
    lines.push(`- ${ecosystem}: ${count} package(s)`);
  }
  lines.push(`- Vulnerable packages: ${summary.vulnerable_packages}`);

  const listed = summary.vulnerable_list.slice(0, MAX_VULNERABLE_LISTED);
  for (const entry of listed) {
    lines.push(`  - ${entry}`);
  }
  if (summary.vulnerable_list.length > listed.length) {
    lines.push(`  - ... and ${summary.vulnerable_list.length - listed.length} more`);
  }
  return lines;
}

function securitySection(findings: SecurityFinding[]): string[] {
  const byFile = new Map<string, SecurityFinding[]>();
  for (const finding of findings) {
    const list = byFile.get(finding.file_path);
    if (list) {
      list.push(finding);
    } else {
      byFile.set(finding.file_path, [finding]);
    }
  }

  const lines = ["", "### Security Findings:"];
  for (const [file, fileFindings] of byFile) {
    lines.push(`#### ${file}`);
    for (const finding of fileFindings.slice(0, MAX_FINDINGS_PER_FILE)) {
      lines.push(`- Line ${finding.line_number}: ${finding.message}`);
    }
    if (fileFindings.length > MAX_FINDINGS_PER_FILE) {
      lines.push(`- ... and ${fileFindings.length - MAX_FINDINGS_PER_FILE} more in ${file}`);
    }
  }
  return lines;
}

function changeSection(change: Change, limits: ContextLimits): string[] {
  switch (change.change_type) {
    case "delete":
      return ["", `**Deleted**: ${change.path}`];
    case "add": {
      const lines = ["", `**Added**: ${change.path}`];
      if (change.new_content) {
        lines.push("```", change.new_content.slice(0, limits.maxAddedChars), "```");
      }
      return lines;
    }
    case "edit": {
      const lines = ["", `**Modified**: ${change.path}`];
      if (change.old_content && change.new_content) {
        lines.push("", "Changes:");
        lines.push("```diff", buildSimpleDiff(change.old_content, change.new_content, limits.maxDiffLines), "```");
      }
      return lines;
    }
  }
}

export interface ReviewContextParams {
  metadata: PullRequestMetadata;
  changes: Change[];
  categories: Map<FileCategory, string[]>;
  dependencySummary: DependencySummary;
  securityFindings: SecurityFinding[];
  customInstructions?: string;
  limits?: Partial<ContextLimits>;
}

/**
 * Build the full review context. The output depends only on the inputs.
 */
export function buildReviewContext(params: ReviewContextParams): string {
  const { metadata, changes, categories, dependencySummary, securityFindings, customInstructions } = params;
  const limits: ContextLimits = {
    maxDiffLines: params.limits?.maxDiffLines ?? DEFAULT_MAX_DIFF_LINES,
    maxAddedChars: params.limits?.maxAddedChars ?? DEFAULT_MAX_ADDED_CHARS,
  };

  const lines = [
    `Pull Request #${metadata.id}: ${metadata.title}`,
    `Description: ${metadata.description || "No description provided"}`,
    `Source Branch: ${metadata.source_branch}`,
    `Target Branch: ${metadata.target_branch}`,
    `Author: ${metadata.author}`,
    "",
    "### File Type Summary:",
  ];

  for (const [category, files] of categories) {
    if (files.length > 0) {
      lines.push(`- ${category}: ${files.length} file(s)`);
    }
  }

  if (dependencySummary.total_packages_examined > 0) {
    lines.push(...dependencySection(dependencySummary));
  }
  if (securityFindings.length > 0) {
    lines.push(...securitySection(securityFindings));
  }

  lines.push("", "### File Changes:");
  for (const [category, files] of categories) {
    if (files.length === 0) continue;
    lines.push("", `#### ${categoryTitle(category)} Files:`);
    const members = new Set(files);
    for (const change of changes) {
      if (members.has(change.path)) {
        lines.push(...changeSection(change, limits));
      }
    }
  }

  lines.push("", "### Review Instructions:", getReviewInstructions(categories, customInstructions));
  return lines.join("\n");
}
