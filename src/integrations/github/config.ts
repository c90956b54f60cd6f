/**
 * Repository configuration fetching (.diffwarden.yml).
 */

import { createDefaultConfig, loadConfigFromString, LoadedConfig, parseConfigYaml, buildLoadedConfig } from "../../config/loader";
import { CONFIG_FILE_NAME } from "../../config/schema";
import { createLogger } from "../../logger";

const log = createLogger("Config");

/** Reads a repository file at a ref; null when it is missing or unreadable. */
export type RepoFileReader = (path: string, ref: string) => Promise<string | null>;

/**
 * Fetch the .diffwarden.yml configuration of a pull request's target.
 * Only the base branch is read: a pull request cannot change the rules it
 * is reviewed under. A custom prompt file named by the config is read from
 * the same ref.
 *
 * @param baseRef - The PR base branch ref (e.g., "main")
 * @returns LoadedConfig (defaults if config file not found)
 */
export async function fetchRepoConfig(readFile: RepoFileReader, baseRef: string): Promise<LoadedConfig> {
  const content = await readFile(CONFIG_FILE_NAME, baseRef);
  if (content === null) {
    log.debug(`No ${CONFIG_FILE_NAME} found at ref ${baseRef}, using defaults`);
    return createDefaultConfig();
  }

  log.info(`Loaded ${CONFIG_FILE_NAME} from ref: ${baseRef}`);
  const rawConfig = parseConfigYaml(content);
  const promptFile = rawConfig.review?.custom_prompt_file;
  if (!promptFile) {
    return loadConfigFromString(content);
  }

  const prompt = await readFile(promptFile, baseRef);
  if (prompt === null) {
    log.warn(`Custom prompt file ${promptFile} not found at ref ${baseRef}, using generated instructions`);
  }
  return buildLoadedConfig(rawConfig, prompt ?? undefined);
}
