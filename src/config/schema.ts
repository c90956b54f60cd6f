/**
 * Configuration schema types for .diffwarden.yml files.
 *
 * The file lives in the repository root and customizes how pull requests in
 * that repository are reviewed.
 */

/**
 * File filtering configuration options.
 */
export interface DiffwardenFilesConfig {
  /**
   * Glob patterns for files excluded from security and dependency scanning.
   * Ignored files still appear in the change listing.
   * Example: ["vendor/**", "**\/*.min.js"]
   */
  ignore?: string[];
}

/**
 * Review context options.
 */
export interface DiffwardenReviewConfig {
  /**
   * Path (relative to the repository root) of a file whose content replaces
   * the generated review instructions.
   */
  custom_prompt_file?: string;

  /**
   * Inline replacement for the generated review instructions.
   * Ignored when custom_prompt_file resolves.
   */
  custom_instructions?: string;

  /**
   * Maximum line pairs in each modified file's diff.
   * Default: 500
   */
  max_diff_lines?: number;

  /**
   * Maximum characters of an added file's content.
   * Default: 10000
   */
  max_added_chars?: number;
}

/**
 * Review policy options.
 */
export interface DiffwardenPolicyConfig {
  /**
   * Reject bug fixes that do not include tests.
   * Default: true
   */
  require_tests_for_bug_fixes?: boolean;

  /**
   * Words in the title or description that mark a pull request as a bug fix.
   * Default: ["fix", "bug", "bugfix", "hotfix", "defect", "regression"]
   */
  bug_fix_keywords?: string[];
}

/**
 * Reviewing agent options.
 */
export interface DiffwardenAgentConfig {
  /**
   * Model name. Defaults to the REVIEW_MODEL environment variable.
   */
  model?: string;

  /**
   * Default: 0.1
   */
  temperature?: number;

  /**
   * Default: 4096
   */
  max_tokens?: number;
}

/**
 * Complete .diffwarden.yml structure.
 */
export interface DiffwardenConfig {
  version?: number;
  files?: DiffwardenFilesConfig;
  review?: DiffwardenReviewConfig;
  policy?: DiffwardenPolicyConfig;
  agent?: DiffwardenAgentConfig;
}

// ============================================================================
// Resolved Types and Defaults
// ============================================================================

export interface RequiredReviewConfig {
  custom_prompt_file: string | null;
  custom_instructions: string | null;
  max_diff_lines: number;
  max_added_chars: number;
}

export interface RequiredPolicyConfig {
  require_tests_for_bug_fixes: boolean;
  bug_fix_keywords: string[];
}

export interface RequiredAgentConfig {
  model: string | null;
  temperature: number;
  max_tokens: number;
}

export const DEFAULT_REVIEW_CONFIG: RequiredReviewConfig = {
  custom_prompt_file: null,
  custom_instructions: null,
  max_diff_lines: 500,
  max_added_chars: 10000,
};

export const DEFAULT_POLICY_CONFIG: RequiredPolicyConfig = {
  require_tests_for_bug_fixes: true,
  bug_fix_keywords: ["fix", "bug", "bugfix", "hotfix", "defect", "regression"],
};

export const DEFAULT_AGENT_CONFIG: RequiredAgentConfig = {
  model: null,
  temperature: 0.1,
  max_tokens: 4096,
};

export const CONFIG_FILE_NAME = ".diffwarden.yml";
