/**
 * Tests for the reviewing agent and its retry logic.
 */

import {
  ChatReviewAgent,
  CompletionRequest,
  SYSTEM_PROMPT,
  createReviewAgent,
} from "../src/integrations/agent/agent";
import { isTransientError, withRetry } from "../src/integrations/agent/retry";
import { config } from "../src/env";

// Mock the OpenAI module
jest.mock("openai");

// Mock the config module
jest.mock("../src/env", () => ({
  config: {
    REVIEW_AGENT_API_KEY: undefined,
    REVIEW_AGENT_BASE_URL: "http://localhost:1/v1",
    REVIEW_MODEL: "test-model",
  },
}));

const defaults = { model: "test-model", temperature: 0.1, maxTokens: 4096 };

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe("ChatReviewAgent", () => {
  it("should send the context and return the parsed verdict", async () => {
    const complete = jest.fn<Promise<string | null>, [CompletionRequest]>();
    complete.mockResolvedValue('Review:\n```json\n{"approved": true, "severity": "approved"}\n```');
    const agent = new ChatReviewAgent(complete, defaults, 1);

    const verdict = await agent.review("Pull Request #1: Add export");

    expect(verdict).toEqual({ approved: true, severity: "approved" });
    expect(complete).toHaveBeenCalledWith({
      model: "test-model",
      system: SYSTEM_PROMPT,
      user: "Pull Request #1: Add export",
      temperature: 0.1,
      maxTokens: 4096,
    });
  });

  it("should apply per-call options", async () => {
    const complete = jest.fn<Promise<string | null>, [CompletionRequest]>();
    complete.mockResolvedValue("{}");
    const agent = new ChatReviewAgent(complete, defaults, 1);

    await agent.review("ctx", { model: "large-model", temperature: 0, maxTokens: 100 });

    expect(complete.mock.calls[0][0]).toMatchObject({ model: "large-model", temperature: 0, maxTokens: 100 });
  });

  it("should return null for empty or non-JSON answers", async () => {
    const complete = jest.fn<Promise<string | null>, [CompletionRequest]>();
    complete.mockResolvedValueOnce(null).mockResolvedValueOnce("I cannot review this change.");
    const agent = new ChatReviewAgent(complete, defaults, 1);

    expect(await agent.review("ctx")).toBeNull();
    expect(await agent.review("ctx")).toBeNull();
  });

  it("should retry transient failures", async () => {
    const complete = jest.fn<Promise<string | null>, [CompletionRequest]>();
    complete.mockRejectedValueOnce(httpError("Too many requests", 429)).mockResolvedValueOnce('{"approved": false}');
    const agent = new ChatReviewAgent(complete, defaults, 1);

    expect(await agent.review("ctx")).toEqual({ approved: false });
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("should not retry permanent failures", async () => {
    const complete = jest.fn<Promise<string | null>, [CompletionRequest]>();
    complete.mockRejectedValue(httpError("Incorrect API key provided", 401));
    const agent = new ChatReviewAgent(complete, defaults, 1);

    await expect(agent.review("ctx")).rejects.toThrow("Incorrect API key provided");
    expect(complete).toHaveBeenCalledTimes(1);
  });
});

describe("createReviewAgent", () => {
  afterEach(() => {
    config.REVIEW_AGENT_API_KEY = undefined;
  });

  it("should return null without an API key", () => {
    expect(createReviewAgent()).toBeNull();
  });

  it("should create a chat agent when an API key is set", () => {
    config.REVIEW_AGENT_API_KEY = "test-secret";
    expect(createReviewAgent()).toBeInstanceOf(ChatReviewAgent);
  });
});

describe("retry", () => {
  it("should classify transient errors", () => {
    expect(isTransientError({ status: 503 })).toBe(true);
    expect(isTransientError({ status: 400 })).toBe(false);
    expect(isTransientError(new Error("socket hang up"))).toBe(true);
    expect(isTransientError(new Error("Bad request"))).toBe(false);
    expect(isTransientError("timeout")).toBe(false);
  });

  it("should give up after the last attempt", async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(httpError("Bad gateway", 502));

    await expect(withRetry(fn, 2, 1)).rejects.toThrow("Bad gateway");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should return the first success", async () => {
    const fn = jest.fn<Promise<string>, []>().mockResolvedValue("ok");

    await expect(withRetry(fn, 2, 1)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
