import type {
  CommitStatus,
  GitHubUserProfile,
  Issue,
  IssueComment,
  PullRequestCommit,
  PullRequestReview,
} from "./types";

const API_URL = "https://api.github.com";
const PAGE_SIZE = 100;

/**
 * The slice of the GitHub REST API the reconciler needs.
 */
export interface GitHubClient {
  getFileContent(owner: string, repo: string, path: string, ref: string): Promise<string | null>;
  listPullRequestCommits(owner: string, repo: string, pullNumber: number): Promise<PullRequestCommit[]>;
  listPullRequestReviews(owner: string, repo: string, pullNumber: number): Promise<PullRequestReview[]>;
  /** Comments on an issue, or the conversation comments of a pull request. */
  listIssueComments(owner: string, repo: string, issueNumber: number): Promise<IssueComment[]>;
  getIssue(owner: string, repo: string, issueNumber: number): Promise<Issue | null>;
  getUser(login: string): Promise<GitHubUserProfile | null>;
  createIssueComment(owner: string, repo: string, issueNumber: number, body: string): Promise<void>;
  createCommitStatus(owner: string, repo: string, sha: string, status: CommitStatus): Promise<void>;
}

export function createGitHubClient(token: string): GitHubClient {
  const headers = {
    Authorization: `Bearer ${token}`,
    Accept: "application/vnd.github+json",
    "X-GitHub-Api-Version": "2022-11-28",
  };

  async function getJson<T>(path: string): Promise<T> {
    const res = await fetch(`${API_URL}${path}`, { headers });
    if (!res.ok) {
      throw new Error(`GitHub request ${path} failed (${res.status})`);
    }
    return (await res.json()) as T;
  }

  async function getAllPages<T>(path: string): Promise<T[]> {
    const items: T[] = [];
    const separator = path.includes("?") ? "&" : "?";
    for (let page = 1; ; page++) {
      const batch = await getJson<T[]>(`${path}${separator}per_page=${PAGE_SIZE}&page=${page}`);
      items.push(...batch);
      if (batch.length < PAGE_SIZE) {
        return items;
      }
    }
  }

  async function post(path: string, body: unknown): Promise<void> {
    const res = await fetch(`${API_URL}${path}`, {
      method: "POST",
      headers: { ...headers, "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`GitHub request ${path} failed (${res.status}): ${text}`);
    }
  }

  return {
    async getFileContent(owner, repo, path, ref) {
      const url = `${API_URL}/repos/${owner}/${repo}/contents/${encodeURI(path)}?ref=${encodeURIComponent(ref)}`;
      const res = await fetch(url, {
        headers: { ...headers, Accept: "application/vnd.github.raw+json" },
      });

      if (res.status === 404) {
        return null;
      }
      if (!res.ok) {
        throw new Error(`Failed to fetch ${path} from ${owner}/${repo} (${res.status})`);
      }
      return res.text();
    },

    listPullRequestCommits(owner, repo, pullNumber) {
      return getAllPages<PullRequestCommit>(`/repos/${owner}/${repo}/pulls/${pullNumber}/commits`);
    },

    listPullRequestReviews(owner, repo, pullNumber) {
      return getAllPages<PullRequestReview>(`/repos/${owner}/${repo}/pulls/${pullNumber}/reviews`);
    },

    listIssueComments(owner, repo, issueNumber) {
      return getAllPages<IssueComment>(`/repos/${owner}/${repo}/issues/${issueNumber}/comments`);
    },

    async getIssue(owner, repo, issueNumber) {
      const res = await fetch(`${API_URL}/repos/${owner}/${repo}/issues/${issueNumber}`, { headers });
      if (res.status === 404 || res.status === 410) {
        return null;
      }
      if (!res.ok) {
        throw new Error(`Failed to fetch issue #${issueNumber} from ${owner}/${repo} (${res.status})`);
      }
      return (await res.json()) as Issue;
    },

    async getUser(login) {
      const res = await fetch(`${API_URL}/users/${encodeURIComponent(login)}`, { headers });
      if (res.status === 404) {
        return null;
      }
      if (!res.ok) {
        throw new Error(`Failed to fetch user ${login} (${res.status})`);
      }
      return (await res.json()) as GitHubUserProfile;
    },

    createIssueComment(owner, repo, issueNumber, body) {
      return post(`/repos/${owner}/${repo}/issues/${issueNumber}/comments`, { body });
    },

    createCommitStatus(owner, repo, sha, status) {
      return post(`/repos/${owner}/${repo}/statuses/${sha}`, status);
    },
  };
}
