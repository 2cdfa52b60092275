import { Hono } from "hono";
import { buildPolicy, getConfig, lookupOptions } from "../config";
import { CffDocumentError } from "../errors";
import { createGitHubAuth } from "../github/auth";
import { createGitHubClient, type GitHubClient } from "../github/client";
import { collectPullRequestEvents } from "../github/events";
import type { CommitState, PullRequestWebhookPayload } from "../github/types";
import { verifySignature } from "../github/verify";
import { createOrcidClient } from "../orcid/client";
import { runPipeline } from "../pipeline";

export const STATUS_CONTEXT = "citation/authors";
const HANDLED_ACTIONS = new Set(["opened", "synchronize", "reopened", "edited"]);

function splitRepo(fullName: string): [string, string] {
  const [owner, repo] = fullName.split("/");
  return [owner, repo];
}

async function publishStatus(
  client: GitHubClient,
  owner: string,
  repo: string,
  sha: string,
  state: CommitState,
  description: string,
): Promise<void> {
  await client.createCommitStatus(owner, repo, sha, {
    state,
    description: description.length > 140 ? `${description.slice(0, 137)}...` : description,
    context: STATUS_CONTEXT,
  });
}

const webhookRoute = new Hono();

webhookRoute.post("/webhook", async (c) => {
  const config = getConfig();
  const rawBody = await c.req.text();

  const signature = c.req.header("x-hub-signature-256");
  if (!verifySignature(rawBody, signature, config.GITHUB_WEBHOOK_SECRET)) {
    return c.json({ error: "Invalid signature" }, 401);
  }

  const event = c.req.header("x-github-event");
  if (event !== "pull_request") {
    return c.json({ skipped: true, reason: `event type: ${event}` }, 200);
  }

  const payload: PullRequestWebhookPayload = JSON.parse(rawBody);

  if (!HANDLED_ACTIONS.has(payload.action)) {
    return c.json({ skipped: true, reason: `action: ${payload.action}` }, 200);
  }

  const pr = payload.pull_request;
  if (config.TARGET_BRANCH && pr.base.ref !== config.TARGET_BRANCH) {
    return c.json({ skipped: true, reason: `base branch: ${pr.base.ref}` }, 200);
  }

  if (!payload.installation) {
    return c.json({ error: "No installation context" }, 400);
  }

  const auth = createGitHubAuth(config.GITHUB_APP_ID, config.GITHUB_APP_PRIVATE_KEY);
  const token = await auth.getInstallationToken(payload.installation.id);
  const github = createGitHubClient(token);

  const [owner, repo] = splitRepo(payload.repository.full_name);
  const [headOwner, headRepo] = splitRepo(pr.head.repo?.full_name ?? payload.repository.full_name);
  const policy = buildPolicy(config, { baseBranch: pr.base.ref, headBranch: pr.head.ref });

  const cffText = await github.getFileContent(headOwner, headRepo, config.CFF_PATH, pr.head.sha);
  if (cffText === null) {
    const message = `${config.CFF_PATH} not found`;
    await publishStatus(github, owner, repo, pr.head.sha, "failure", message);
    return c.json({ error: message }, 422);
  }

  const events = await collectPullRequestEvents(github, {
    owner,
    repo,
    number: pr.number,
    body: pr.body,
  });

  let output: Awaited<ReturnType<typeof runPipeline>>;
  try {
    output = await runPipeline({
      events,
      cffText,
      cffPath: config.CFF_PATH,
      policy,
      orcid: createOrcidClient(config.ORCID_API_URL),
      lookup: lookupOptions(config),
    });
  } catch (err) {
    if (err instanceof CffDocumentError) {
      console.error(`${payload.repository.full_name}#${pr.number}: ${err.message}`);
      await publishStatus(github, owner, repo, pr.head.sha, "failure", err.message);
      return c.json({ error: err.message }, 422);
    }
    throw err;
  }

  const { report, comment } = output;

  if (policy.postComment) {
    await github.createIssueComment(owner, repo, pr.number, comment);
  }

  const description = report.verdict.passed
    ? `${report.new_authors.length} new author(s), none blocking`
    : `Missing author metadata: ${report.verdict.blockingContributors.join(", ")}`;
  await publishStatus(
    github,
    owner,
    repo,
    pr.head.sha,
    report.verdict.passed ? "success" : "failure",
    description,
  );

  console.log(
    `${payload.repository.full_name}#${pr.number}: ${events.length} events, ${report.new_authors.length} new, ${report.unmatched.length} unmatched, passed=${report.verdict.passed}`,
  );

  return c.json({
    pull_request: pr.number,
    events: events.length,
    new_authors: report.new_authors.length,
    unmatched: report.unmatched.length,
    warnings: report.warnings.length,
    passed: report.verdict.passed,
  });
});

export { webhookRoute };
