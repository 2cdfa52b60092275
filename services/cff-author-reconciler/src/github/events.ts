import type { ContributionEvent, ContributionKind } from "../events/types";
import { extractOrcid } from "../orcid/identifier";
import type { GitHubClient } from "./client";
import type {
  GitHubUser,
  GitHubUserProfile,
  Issue,
  IssueComment,
  PullRequestCommit,
  PullRequestReview,
} from "./types";

const CO_AUTHOR_TRAILER = /^co-authored-by:\s*(.*?)\s*<([^>]*)>\s*$/gim;
const CLOSING_REFERENCE = /\b(?:close[sd]?|fix(?:e[sd])?|resolve[sd]?):?\s+#(\d+)\b/gi;

export interface CoAuthor {
  name: string;
  email: string;
}

export function parseCoAuthors(message: string): CoAuthor[] {
  return Array.from(message.matchAll(CO_AUTHOR_TRAILER), (m) => ({
    name: m[1].trim(),
    email: m[2].trim(),
  }));
}

/**
 * Issue numbers referenced with a closing keyword ("Fixes #12"), in order
 * of first mention.
 */
export function parseLinkedIssues(body: string | null): number[] {
  if (!body) return [];
  const numbers = Array.from(body.matchAll(CLOSING_REFERENCE), (m) => Number(m[1]));
  return Array.from(new Set(numbers));
}

export function commitEvents(commit: PullRequestCommit): ContributionEvent[] {
  const timestamp = commit.commit.author?.date ?? "";
  const events: ContributionEvent[] = [
    {
      kind: "commit",
      identity: {
        username: commit.author?.login,
        displayName: commit.commit.author?.name ?? undefined,
        email: commit.commit.author?.email ?? undefined,
      },
      sourceRef: commit.sha,
      url: commit.html_url,
      timestamp,
    },
  ];

  for (const coAuthor of parseCoAuthors(commit.commit.message)) {
    events.push({
      kind: "commit-co-author",
      identity: {
        displayName: coAuthor.name || undefined,
        email: coAuthor.email || undefined,
      },
      sourceRef: commit.sha,
      url: commit.html_url,
      timestamp,
    });
  }

  return events;
}

/**
 * Conversation from bot accounts, this app's own comments included, is
 * never a contribution.
 */
function isBotAccount(user: GitHubUser): boolean {
  return user.type === "Bot";
}

export function reviewEvent(review: PullRequestReview): ContributionEvent | null {
  if (!review.user || review.state === "PENDING" || !review.submitted_at) {
    return null;
  }
  if (isBotAccount(review.user)) return null;
  return {
    kind: "review",
    identity: { username: review.user.login },
    sourceRef: String(review.id),
    url: review.html_url,
    timestamp: review.submitted_at,
  };
}

export function issueCreationEvent(issue: Issue): ContributionEvent | null {
  if (!issue.user || isBotAccount(issue.user)) return null;
  return {
    kind: "issue-creation",
    identity: { username: issue.user.login },
    sourceRef: String(issue.number),
    url: issue.html_url,
    timestamp: issue.created_at,
  };
}

export function commentEvent(
  kind: Extract<ContributionKind, "issue-comment" | "pr-comment">,
  comment: IssueComment,
): ContributionEvent | null {
  if (!comment.user || isBotAccount(comment.user)) return null;
  return {
    kind,
    identity: { username: comment.user.login },
    sourceRef: String(comment.id),
    url: comment.html_url,
    timestamp: comment.created_at,
  };
}

function present<T>(value: T | null): value is T {
  return value !== null;
}

/**
 * Fill in each account's profile name, public email and an ORCID quoted in
 * its bio. Values already carried by the event are kept. Organization
 * accounts are marked as entities.
 */
export async function withProfiles(
  client: GitHubClient,
  events: readonly ContributionEvent[],
): Promise<ContributionEvent[]> {
  const logins = Array.from(
    new Set(events.map((e) => e.identity.username).filter((u): u is string => !!u)),
  );
  const profiles = new Map<string, GitHubUserProfile>();
  await Promise.all(
    logins.map(async (login) => {
      const profile = await client.getUser(login);
      if (profile) profiles.set(login, profile);
    }),
  );

  return events.map((event) => {
    const profile = event.identity.username ? profiles.get(event.identity.username) : undefined;
    if (!profile) return event;
    return {
      ...event,
      identity: {
        ...event.identity,
        displayName: event.identity.displayName ?? (profile.name || undefined),
        email: event.identity.email ?? (profile.email || undefined),
        orcid: event.identity.orcid ?? extractOrcid(profile.bio) ?? undefined,
        ...(profile.type === "Organization" ? { entity: true } : {}),
      },
    };
  });
}

export interface PullRequestRef {
  owner: string;
  repo: string;
  number: number;
  body: string | null;
}

/**
 * Gather every contribution signal of a pull request: commits and their
 * co-authors, reviews, issues linked with a closing keyword (creation and
 * comments), and the pull request's own conversation comments, enriched
 * with the contributors' profiles.
 */
export async function collectPullRequestEvents(
  client: GitHubClient,
  pr: PullRequestRef,
): Promise<ContributionEvent[]> {
  const { owner, repo, number } = pr;

  const [commits, reviews, prComments] = await Promise.all([
    client.listPullRequestCommits(owner, repo, number),
    client.listPullRequestReviews(owner, repo, number),
    client.listIssueComments(owner, repo, number),
  ]);

  const events: ContributionEvent[] = [
    ...commits.flatMap(commitEvents),
    ...reviews.map(reviewEvent).filter(present),
  ];

  for (const issueNumber of parseLinkedIssues(pr.body)) {
    if (issueNumber === number) continue;

    const issue = await client.getIssue(owner, repo, issueNumber);
    if (!issue || issue.pull_request !== undefined) continue;

    const creation = issueCreationEvent(issue);
    if (creation) events.push(creation);

    const comments = await client.listIssueComments(owner, repo, issueNumber);
    events.push(...comments.map((c) => commentEvent("issue-comment", c)).filter(present));
  }

  events.push(...prComments.map((c) => commentEvent("pr-comment", c)).filter(present));

  return withProfiles(client, events);
}
