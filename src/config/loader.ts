/**
 * Configuration loader for diffwarden.
 *
 * Loads and merges configuration from .diffwarden.yml files,
 * applying defaults to every missing or mistyped value.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";
import { createLogger, errorMessage } from "../logger";
import {
  CONFIG_FILE_NAME,
  DEFAULT_AGENT_CONFIG,
  DEFAULT_POLICY_CONFIG,
  DEFAULT_REVIEW_CONFIG,
  DiffwardenConfig,
  RequiredAgentConfig,
  RequiredPolicyConfig,
  RequiredReviewConfig,
} from "./schema";

const log = createLogger("Config");

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The validated configuration as written (or empty if no file found).
   */
  raw: DiffwardenConfig;

  /**
   * Check if a file should be excluded from scanning.
   * @param filePath - Relative file path from repo root
   */
  isFileIgnored(filePath: string): boolean;

  review: RequiredReviewConfig;
  policy: RequiredPolicyConfig;
  agent: RequiredAgentConfig;

  /**
   * Instruction text replacing the generated review instructions, from the
   * custom prompt file or the inline setting.
   */
  customInstructions?: string;
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function optionalPositiveInt(value: unknown): number | undefined {
  const n = optionalNumber(value);
  return n !== undefined && Number.isInteger(n) && n > 0 ? n : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

function optionalStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string" && item.trim() !== "");
}

/**
 * Keep only the recognized, well-typed settings of a parsed YAML document.
 */
export function validateConfig(parsed: unknown): DiffwardenConfig {
  if (!isRecord(parsed)) {
    return {};
  }
  const files = section(parsed.files);
  const review = section(parsed.review);
  const policy = section(parsed.policy);
  const agent = section(parsed.agent);

  return {
    version: optionalNumber(parsed.version) ?? 1,
    files: { ignore: optionalStringList(files.ignore) },
    review: {
      custom_prompt_file: optionalString(review.custom_prompt_file),
      custom_instructions: optionalString(review.custom_instructions),
      max_diff_lines: optionalPositiveInt(review.max_diff_lines),
      max_added_chars: optionalPositiveInt(review.max_added_chars),
    },
    policy: {
      require_tests_for_bug_fixes: optionalBoolean(policy.require_tests_for_bug_fixes),
      bug_fix_keywords: optionalStringList(policy.bug_fix_keywords),
    },
    agent: {
      model: optionalString(agent.model),
      temperature: optionalNumber(agent.temperature),
      max_tokens: optionalPositiveInt(agent.max_tokens),
    },
  };
}

/**
 * Parse YAML into a validated config. Invalid YAML yields an empty config.
 */
export function parseConfigYaml(yamlContent: string): DiffwardenConfig {
  try {
    return validateConfig(yaml.load(yamlContent));
  } catch (err) {
    log.warn(`Failed to parse ${CONFIG_FILE_NAME}, using defaults`, {
      error: errorMessage(err),
    });
    return {};
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Build a LoadedConfig from a validated config.
 *
 * @param rawConfig - Validated configuration
 * @param customPrompt - Content of review.custom_prompt_file, when it was read
 */
export function buildLoadedConfig(rawConfig: DiffwardenConfig, customPrompt?: string): LoadedConfig {
  const review: RequiredReviewConfig = {
    custom_prompt_file: rawConfig.review?.custom_prompt_file ?? DEFAULT_REVIEW_CONFIG.custom_prompt_file,
    custom_instructions: rawConfig.review?.custom_instructions ?? DEFAULT_REVIEW_CONFIG.custom_instructions,
    max_diff_lines: rawConfig.review?.max_diff_lines ?? DEFAULT_REVIEW_CONFIG.max_diff_lines,
    max_added_chars: rawConfig.review?.max_added_chars ?? DEFAULT_REVIEW_CONFIG.max_added_chars,
  };

  const policy: RequiredPolicyConfig = {
    require_tests_for_bug_fixes:
      rawConfig.policy?.require_tests_for_bug_fixes ?? DEFAULT_POLICY_CONFIG.require_tests_for_bug_fixes,
    bug_fix_keywords: rawConfig.policy?.bug_fix_keywords ?? [...DEFAULT_POLICY_CONFIG.bug_fix_keywords],
  };

  const agent: RequiredAgentConfig = {
    model: rawConfig.agent?.model ?? DEFAULT_AGENT_CONFIG.model,
    temperature: rawConfig.agent?.temperature ?? DEFAULT_AGENT_CONFIG.temperature,
    max_tokens: rawConfig.agent?.max_tokens ?? DEFAULT_AGENT_CONFIG.max_tokens,
  };

  const ignorePatterns = rawConfig.files?.ignore ?? [];

  function isFileIgnored(filePath: string): boolean {
    const normalizedPath = filePath.replace(/\\/g, "/").replace(/^\/+/, "");
    return ignorePatterns.some((pattern) => minimatch(normalizedPath, pattern, { dot: true }));
  }

  const customInstructions =
    customPrompt && customPrompt.trim() ? customPrompt : review.custom_instructions ?? undefined;

  return {
    raw: rawConfig,
    isFileIgnored,
    review,
    policy,
    agent,
    customInstructions,
  };
}

/**
 * Load configuration from a repository root directory.
 *
 * @param repoRoot - Path to the repository root directory
 * @returns LoadedConfig with resolved values and helper methods
 */
export function loadConfig(repoRoot: string): LoadedConfig {
  const configPath = path.join(repoRoot, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) {
    return createDefaultConfig();
  }

  const rawConfig = parseConfigYaml(fs.readFileSync(configPath, "utf-8"));

  let customPrompt: string | undefined;
  const promptFile = rawConfig.review?.custom_prompt_file;
  if (promptFile) {
    try {
      customPrompt = fs.readFileSync(path.resolve(repoRoot, promptFile), "utf-8");
      log.info(`Using custom review prompt from ${promptFile}`);
    } catch (err) {
      log.warn(`Failed to load custom prompt file ${promptFile}, using generated instructions`, {
        error: errorMessage(err),
      });
    }
  }

  return buildLoadedConfig(rawConfig, customPrompt);
}

/**
 * Load configuration from a YAML string (useful for testing or the GitHub integration).
 * This function does not touch the filesystem.
 */
export function loadConfigFromString(yamlContent: string, customPrompt?: string): LoadedConfig {
  return buildLoadedConfig(parseConfigYaml(yamlContent), customPrompt);
}

/**
 * Create a default LoadedConfig without any file.
 */
export function createDefaultConfig(): LoadedConfig {
  return buildLoadedConfig({});
}
