/**
 * OpenAI-compatible client setup for the reviewing agent.
 */

import OpenAI from "openai";
import { config } from "../../env";

/**
 * Create an OpenAI client for the configured chat-completions endpoint.
 * Returns null when no API key is configured.
 */
export function createOpenAIClient(): OpenAI | null {
  if (!config.REVIEW_AGENT_API_KEY) {
    return null;
  }

  return new OpenAI({
    apiKey: config.REVIEW_AGENT_API_KEY,
    baseURL: config.REVIEW_AGENT_BASE_URL,
  });
}
