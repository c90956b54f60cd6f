/**
 * Tests for the pull request event handler and GitHub mappings.
 */

import { AgentOptions } from "../src/integrations/agent/agent";
import { httpStatus, parseRepositoryId } from "../src/integrations/github/client";
import { changeTypeForStatus, reviewEventForVote, voteFromReview } from "../src/integrations/github/hosting";
import { PullRequestEventInfo, WebhookDeps, handlePullRequestEvent } from "../src/integrations/github/webhooks";
import { PublicationLedger } from "../src/publishing/ledger";
import { FakeHostingClient } from "./fixtures/fake-host";

jest.mock("../src/env", () => ({
  config: {
    GITHUB_APP_ID: "1",
    GITHUB_WEBHOOK_SECRET: "test-secret",
    GITHUB_PRIVATE_KEY: "test-key",
    REVIEW_AGENT_API_KEY: undefined,
    REVIEW_AGENT_BASE_URL: "http://localhost:1/v1",
    REVIEW_MODEL: "test-model",
  },
}));

const opened: PullRequestEventInfo = {
  action: "opened",
  installationId: 99,
  owner: "acme",
  repo: "shop",
  pullNumber: 8,
  draft: false,
};

describe("handlePullRequestEvent", () => {
  let host: FakeHostingClient;
  let review: jest.Mock<Promise<unknown>, [string, AgentOptions?]>;
  let deps: WebhookDeps;

  beforeEach(() => {
    host = new FakeHostingClient();
    review = jest.fn<Promise<unknown>, [string, AgentOptions?]>().mockResolvedValue({
      approved: true,
      severity: "approved",
      summary: "Fine",
    });
    deps = { ledger: new PublicationLedger(), agent: { review }, hostForInstallation: () => host };
  });

  it("should review and publish opened pull requests", async () => {
    const result = await handlePullRequestEvent(opened, deps);

    expect(result).toEqual({ comments_posted: 0, vote_updated: true, errors: [], duplicate: false });
    expect(host.votes).toEqual([10]);
    expect(deps.ledger.has({ repositoryId: "acme/shop", pullRequestId: 8 })).toBe(true);
  });

  it("should report a repeated event as a duplicate", async () => {
    await handlePullRequestEvent(opened, deps);
    const second = await handlePullRequestEvent({ ...opened, action: "synchronize" }, deps);

    expect(second?.duplicate).toBe(true);
    expect(review).toHaveBeenCalledTimes(1);
  });

  it.each(["closed", "edited", "labeled"])("should ignore the %s action", async (action) => {
    expect(await handlePullRequestEvent({ ...opened, action }, deps)).toBeNull();
    expect(host.calls).toBe(0);
  });

  it("should skip drafts", async () => {
    expect(await handlePullRequestEvent({ ...opened, draft: true }, deps)).toBeNull();
    expect(review).not.toHaveBeenCalled();
  });

  it("should skip events without an installation", async () => {
    expect(await handlePullRequestEvent({ ...opened, installationId: undefined }, deps)).toBeNull();
  });

  it("should skip reviews when no agent is configured", async () => {
    expect(await handlePullRequestEvent(opened, { ...deps, agent: null })).toBeNull();
    expect(host.calls).toBe(0);
  });

  it("should contain pipeline failures", async () => {
    jest.spyOn(host, "getPullRequest").mockRejectedValue(new Error("Not Found"));

    expect(await handlePullRequestEvent(opened, deps)).toBeNull();
    expect(host.votes).toEqual([]);
  });
});

describe("GitHub mappings", () => {
  it("should map votes to review events", () => {
    expect(reviewEventForVote(10)).toBe("APPROVE");
    expect(reviewEventForVote(5)).toBe("APPROVE");
    expect(reviewEventForVote(0)).toBe("COMMENT");
    expect(reviewEventForVote(-5)).toBe("REQUEST_CHANGES");
    expect(reviewEventForVote(-10)).toBe("REQUEST_CHANGES");
  });

  it("should read our vote back from a review", () => {
    expect(voteFromReview({ state: "CHANGES_REQUESTED", body: "Automated review vote: Waiting for author (-5)" })).toBe(-5);
    expect(voteFromReview({ state: "APPROVED", body: "" })).toBe(10);
    expect(voteFromReview({ state: "CHANGES_REQUESTED", body: "Please fix" })).toBe(-10);
    expect(voteFromReview({ state: "COMMENTED", body: null })).toBe(0);
    expect(voteFromReview({ state: "DISMISSED", body: null })).toBeNull();
  });

  it("should map file statuses to change types", () => {
    expect(changeTypeForStatus("added")).toBe("add");
    expect(changeTypeForStatus("removed")).toBe("delete");
    expect(changeTypeForStatus("modified")).toBe("edit");
    expect(changeTypeForStatus("renamed")).toBe("edit");
  });

  it("should parse repository ids", () => {
    expect(parseRepositoryId("acme/shop")).toEqual({ owner: "acme", repo: "shop" });
    expect(() => parseRepositoryId("acme")).toThrow('Invalid repository id "acme", expected owner/name');
    expect(() => parseRepositoryId("a/b/c")).toThrow();
  });

  it("should read HTTP status from request errors", () => {
    expect(httpStatus(Object.assign(new Error("Not Found"), { status: 404 }))).toBe(404);
    expect(httpStatus(new Error("boom"))).toBeUndefined();
    expect(httpStatus({ status: "404" })).toBeUndefined();
  });
});
