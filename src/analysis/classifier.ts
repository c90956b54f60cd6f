/**
 * File categorization for pull request changes.
 */

import * as path from "path";
import { Change } from "../review/types";
import {
  CONFIG_FILE_NAMES,
  CSHARP_TEST_PATTERNS,
  DOMINANT_PRIORITY,
  EXTENSION_MAP,
  FileCategory,
  JAVASCRIPT_TEST_PATTERNS,
  PACKAGE_FILES,
  PROJECT_FILE_EXTENSIONS,
  PYTHON_TEST_PATTERNS,
  SIGNIFICANT_CATEGORIES,
} from "./categories";

const JS_FAMILY_EXTENSIONS = [".js", ".jsx", ".ts", ".tsx"];

const SCRIPT_BLOCK_PATTERN = /<script[^>]*>[\s\S]*?<\/script>/gi;

function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

function lookupManifest(fileName: string): FileCategory | null {
  const exact = PACKAGE_FILES[fileName];
  if (exact) {
    return exact;
  }

  const lower = fileName.toLowerCase();
  for (const [manifestName, category] of Object.entries(PACKAGE_FILES)) {
    if (manifestName.toLowerCase() === lower) {
      return category;
    }
  }
  return null;
}

/**
 * Check whether a path looks like a C# or JavaScript/TypeScript test file.
 */
export function isTestPath(filePath: string): boolean {
  const normalized = normalizePath(filePath);
  return (
    CSHARP_TEST_PATTERNS.some((p) => p.test(normalized)) ||
    JAVASCRIPT_TEST_PATTERNS.some((p) => p.test(normalized))
  );
}

/**
 * Broader test detection used when building the change list.
 * Also recognizes Python test modules.
 */
export function isTestFile(filePath: string): boolean {
  return isTestPath(filePath) || PYTHON_TEST_PATTERNS.some((p) => p.test(normalizePath(filePath)));
}

/**
 * Check if a Razor view carries significant inline script.
 */
export function hasSignificantScript(content: string): boolean {
  const scripts = content.match(SCRIPT_BLOCK_PATTERN);

  if (scripts && scripts.length > 0) {
    const totalLength = scripts.reduce((sum, s) => sum + s.length, 0);
    return totalLength > 500 || totalLength > content.length * 0.2;
  }

  return content.includes("@section Scripts") || content.includes("@section scripts");
}

/**
 * Assign exactly one category to a path, optionally refined by its content.
 */
export function classifyFile(filePath: string, content?: string): FileCategory {
  const normalized = normalizePath(filePath);
  const fileName = path.posix.basename(normalized);
  const lowerName = fileName.toLowerCase();

  // Manifests win over everything else, including extension
  const manifest = lookupManifest(fileName);
  if (manifest) {
    return manifest;
  }

  if (PROJECT_FILE_EXTENSIONS.some((ext) => lowerName.endsWith(ext))) {
    return "package_csharp";
  }

  if (isTestPath(normalized)) {
    if (lowerName.endsWith(".cs")) {
      return "test_csharp";
    }
    if (JS_FAMILY_EXTENSIONS.some((ext) => lowerName.endsWith(ext))) {
      return "test_javascript";
    }
  }

  const ext = path.posix.extname(lowerName);
  const byExtension = ext ? EXTENSION_MAP[ext] : undefined;
  if (byExtension) {
    if (byExtension === "razor_view" && content && hasSignificantScript(content)) {
      // Stays a Razor view; the instructions cover inline script
      return "razor_view";
    }

    if (byExtension === "json" && content && content.includes("dependencies")) {
      return "package_javascript";
    }

    return byExtension;
  }

  if (CONFIG_FILE_NAMES.has(lowerName)) {
    return "config";
  }
  if (lowerName.startsWith(".") && !ext) {
    return "config";
  }

  return "default";
}

/**
 * Group changes by category, in order of first appearance.
 */
export function analyzeFileSet(changes: Change[]): Map<FileCategory, string[]> {
  const groups = new Map<FileCategory, string[]>();

  for (const change of changes) {
    const content = change.new_content || change.old_content;
    const category = classifyFile(change.path, content);
    const existing = groups.get(category);
    if (existing) {
      existing.push(change.path);
    } else {
      groups.set(category, [change.path]);
    }
  }

  return groups;
}

/**
 * Pick the dominant category of an already grouped file set.
 */
export function dominantOf(groups: Map<FileCategory, string[]>): FileCategory {
  if (groups.size === 0) {
    return "default";
  }

  for (const category of DOMINANT_PRIORITY) {
    const files = groups.get(category);
    if (files && files.length > 0) {
      return category;
    }
  }

  let best: FileCategory = "default";
  let bestCount = -1;
  for (const [category, files] of groups) {
    if (files.length > bestCount) {
      best = category;
      bestCount = files.length;
    }
  }
  return best;
}

/**
 * Check if grouped files span more than one significant category.
 */
export function isMixed(groups: Map<FileCategory, string[]>): boolean {
  let significant = 0;
  for (const [category, files] of groups) {
    if (SIGNIFICANT_CATEGORIES.has(category) && files.length > 0) {
      significant++;
    }
  }
  return significant > 1;
}

export function dominantCategory(changes: Change[]): FileCategory {
  return dominantOf(analyzeFileSet(changes));
}

export function needsMixedReview(changes: Change[]): boolean {
  return isMixed(analyzeFileSet(changes));
}
