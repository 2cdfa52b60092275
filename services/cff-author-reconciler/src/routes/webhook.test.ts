import { describe, it, expect, vi, beforeEach } from "vitest";
import { createHmac } from "node:crypto";
import { Hono } from "hono";
import { STATUS_CONTEXT, webhookRoute } from "./webhook";
import type { GitHubClient } from "../github/client";
import type { IssueComment, PullRequestCommit, PullRequestReview } from "../github/types";

vi.mock("../config", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../config")>();
  return {
    ...actual,
    getConfig: () =>
      actual.loadConfig({
        GITHUB_APP_ID: "123456",
        GITHUB_APP_PRIVATE_KEY: Buffer.from("fake-key").toString("base64"),
        GITHUB_WEBHOOK_SECRET: "test-secret",
        TARGET_BRANCH: "main",
        ORCID_LOOKUP: "false",
      }),
  };
});

vi.mock("../github/auth", () => ({
  createGitHubAuth: () => ({
    getInstallationToken: vi.fn().mockResolvedValue("ghs_test_token"),
  }),
}));

const github = vi.hoisted(() => ({
  getFileContent: vi.fn<GitHubClient["getFileContent"]>(),
  listPullRequestCommits: vi.fn<GitHubClient["listPullRequestCommits"]>(),
  listPullRequestReviews: vi.fn<GitHubClient["listPullRequestReviews"]>(),
  listIssueComments: vi.fn<GitHubClient["listIssueComments"]>(),
  getIssue: vi.fn<GitHubClient["getIssue"]>(),
  getUser: vi.fn<GitHubClient["getUser"]>(),
  createIssueComment: vi.fn<GitHubClient["createIssueComment"]>(),
  createCommitStatus: vi.fn<GitHubClient["createCommitStatus"]>(),
}));

vi.mock("../github/client", () => ({
  createGitHubClient: () => github,
}));

function sign(body: string, secret: string): string {
  return "sha256=" + createHmac("sha256", secret).update(body, "utf8").digest("hex");
}

function makeCommit(author: PullRequestCommit["author"]): PullRequestCommit {
  return {
    sha: "abc1234def",
    html_url: "https://github.com/octo/demo/commit/abc1234def",
    commit: {
      message: "Add parser",
      author: author
        ? { name: "Alice Liddell", email: "alice@example.org", date: "2024-05-01T10:00:00Z" }
        : { date: "2024-05-01T10:00:00Z" },
    },
    author,
  };
}

function makePayload(overrides: Record<string, unknown> = {}) {
  return {
    action: "opened",
    number: 7,
    pull_request: {
      number: 7,
      body: null,
      html_url: "https://github.com/octo/demo/pull/7",
      head: { sha: "headsha", ref: "feature", repo: { full_name: "fork/demo" } },
      base: { ref: "main" },
      user: { login: "alice" },
    },
    repository: { full_name: "octo/demo", name: "demo", owner: { login: "octo" } },
    installation: { id: 789 },
    ...overrides,
  };
}

interface WebhookResponse {
  skipped?: boolean;
  reason?: string;
  error?: string;
  pull_request?: number;
  events?: number;
  new_authors?: number;
  unmatched?: number;
  warnings?: number;
  passed?: boolean;
}

describe("POST /webhook", () => {
  let app: Hono;

  beforeEach(() => {
    app = new Hono();
    app.route("/", webhookRoute);

    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    github.getFileContent.mockResolvedValue("cff-version: 1.2.0\ntitle: Demo\n");
    github.listPullRequestCommits.mockResolvedValue([makeCommit({ login: "alice" })]);
    github.listPullRequestReviews.mockResolvedValue([] satisfies PullRequestReview[]);
    github.listIssueComments.mockResolvedValue([] satisfies IssueComment[]);
    github.getIssue.mockResolvedValue(null);
    github.getUser.mockResolvedValue(null);
    github.createIssueComment.mockResolvedValue(undefined);
    github.createCommitStatus.mockResolvedValue(undefined);
  });

  function deliver(payload: unknown, event = "pull_request", secret = "test-secret") {
    const body = JSON.stringify(payload);
    return app.request("/webhook", {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-hub-signature-256": sign(body, secret),
        "x-github-event": event,
      },
      body,
    });
  }

  it("rejects requests with an invalid signature", async () => {
    const res = await deliver(makePayload(), "pull_request", "wrong-secret");
    expect(res.status).toBe(401);
  });

  it("skips other events", async () => {
    const res = await deliver({ ref: "refs/heads/main" }, "push");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ skipped: true, reason: "event type: push" });
  });

  it("skips unhandled actions", async () => {
    const res = await deliver(makePayload({ action: "closed" }));
    expect(await res.json()).toEqual({ skipped: true, reason: "action: closed" });
  });

  it("skips pull requests against other branches", async () => {
    const payload = makePayload();
    const res = await deliver({
      ...payload,
      pull_request: { ...payload.pull_request, base: { ref: "develop" } },
    });
    expect(await res.json()).toEqual({ skipped: true, reason: "base branch: develop" });
  });

  it("requires an installation", async () => {
    const res = await deliver(makePayload({ installation: undefined }));
    expect(res.status).toBe(400);
  });

  it("reconciles the pull request, comments and sets a passing status", async () => {
    const res = await deliver(makePayload());

    expect(res.status).toBe(200);
    const json = (await res.json()) as WebhookResponse;
    expect(json).toEqual({
      pull_request: 7,
      events: 1,
      new_authors: 1,
      unmatched: 0,
      warnings: 1,
      passed: true,
    });
    expect(github.getFileContent).toHaveBeenCalledWith("fork", "demo", "CITATION.cff", "headsha");
    expect(github.createIssueComment).toHaveBeenCalledWith(
      "octo",
      "demo",
      7,
      expect.stringContaining("New authors to add to `CITATION.cff`:\n- `alice`: Commit:"),
    );
    expect(github.createCommitStatus).toHaveBeenCalledWith("octo", "demo", "headsha", {
      state: "success",
      description: "1 new author(s), none blocking",
      context: STATUS_CONTEXT,
    });
  });

  it("does not credit the app for its own earlier comment", async () => {
    github.listIssueComments.mockResolvedValue([
      {
        id: 900,
        html_url: "https://github.com/octo/demo/pull/7#issuecomment-900",
        created_at: "2024-05-02T10:00:00Z",
        user: { login: "citation-app[bot]", type: "Bot" },
      },
    ]);

    const res = await deliver(makePayload({ action: "synchronize" }));
    const json = (await res.json()) as WebhookResponse;

    expect(json.events).toBe(1);
    expect(json.new_authors).toBe(1);
    expect(github.getUser).not.toHaveBeenCalledWith("citation-app[bot]");
  });

  it("fails the status when a contributor cannot be added", async () => {
    github.listPullRequestCommits.mockResolvedValue([makeCommit(null)]);

    const res = await deliver(makePayload());
    const json = (await res.json()) as WebhookResponse;

    expect(json.passed).toBe(false);
    expect(json.unmatched).toBe(1);
    expect(github.createCommitStatus).toHaveBeenCalledWith("octo", "demo", "headsha", {
      state: "failure",
      description: "Missing author metadata: unidentified:commit:abc1234def",
      context: STATUS_CONTEXT,
    });
  });

  it("fails when the citation file is missing", async () => {
    github.getFileContent.mockResolvedValue(null);

    const res = await deliver(makePayload());

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "CITATION.cff not found" });
    expect(github.createIssueComment).not.toHaveBeenCalled();
    expect(github.createCommitStatus).toHaveBeenCalledWith("octo", "demo", "headsha", {
      state: "failure",
      description: "CITATION.cff not found",
      context: STATUS_CONTEXT,
    });
  });

  it("fails when the citation file is malformed", async () => {
    github.getFileContent.mockResolvedValue("cff-version: 1.2.0\nauthors: nobody\n");

    const res = await deliver(makePayload());

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "`authors` must be a list" });
  });
});
