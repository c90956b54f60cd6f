/**
 * The reviewing agent: sends the review context to a chat-completions model
 * and returns the JSON object it answers with.
 */

import OpenAI from "openai";
import { config } from "../../env";
import { createLogger } from "../../logger";
import { extractJsonObject } from "../../review/parsing";
import { createOpenAIClient } from "./client";
import { withRetry } from "./retry";

const log = createLogger("Agent");

export interface AgentOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ReviewAgent {
  /**
   * Review an assembled context. Resolves to the raw verdict object, or
   * null when the answer held no JSON object.
   */
  review(context: string, options?: AgentOptions): Promise<unknown>;
}

export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

/**
 * One chat completion round trip. Resolves to the message text, or null when
 * the model returned no content.
 */
export type CompletionFn = (request: CompletionRequest) => Promise<string | null>;

export function openAICompletion(client: OpenAI): CompletionFn {
  return async (request) => {
    const completion = await client.chat.completions.create({
      model: request.model,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.user },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });
    return completion.choices[0]?.message?.content ?? null;
  };
}

export const SYSTEM_PROMPT =
  "You are an expert code reviewer. Answer with a single JSON object in the requested format and nothing else.";

export class ChatReviewAgent implements ReviewAgent {
  constructor(
    private readonly complete: CompletionFn,
    private readonly defaults: Required<AgentOptions>,
    private readonly retryDelayMs?: number
  ) {}

  async review(context: string, options: AgentOptions = {}): Promise<unknown> {
    const model = options.model ?? this.defaults.model;
    log.info("Requesting review", { model, contextChars: context.length });

    const content = await withRetry(
      () =>
        this.complete({
          model,
          system: SYSTEM_PROMPT,
          user: context,
          temperature: options.temperature ?? this.defaults.temperature,
          maxTokens: options.maxTokens ?? this.defaults.maxTokens,
        }),
      undefined,
      this.retryDelayMs
    );

    if (!content) {
      log.warn("Empty response from model");
      return null;
    }

    const parsed = extractJsonObject(content);
    if (parsed === undefined) {
      // Truncate to avoid logging echoed secrets
      log.error("Model response held no JSON object", { response: content.slice(0, 200) });
      return null;
    }
    return parsed;
  }
}

/**
 * Create the agent for the configured endpoint, or null when no API key is set.
 */
export function createReviewAgent(): ReviewAgent | null {
  const client = createOpenAIClient();
  if (!client) {
    log.warn("REVIEW_AGENT_API_KEY not configured, agent reviews unavailable");
    return null;
  }
  return new ChatReviewAgent(openAICompletion(client), {
    model: config.REVIEW_MODEL,
    temperature: 0.1,
    maxTokens: 4096,
  });
}
