export type GitHubAccountType = "User" | "Organization" | "Bot";

export interface GitHubUser {
  login: string;
  type?: GitHubAccountType;
}

export interface GitHubUserProfile {
  login: string;
  type: GitHubAccountType;
  name: string | null;
  email: string | null;
  bio: string | null;
}

export interface PullRequestWebhookPayload {
  action: string;
  number: number;
  pull_request: {
    number: number;
    body: string | null;
    html_url: string;
    head: {
      sha: string;
      ref: string;
      repo: { full_name: string } | null;
    };
    base: {
      ref: string;
    };
    user: GitHubUser;
  };
  repository: {
    full_name: string;
    name: string;
    owner: {
      login: string;
    };
  };
  installation?: {
    id: number;
  };
}

export interface PullRequestCommit {
  sha: string;
  html_url: string;
  commit: {
    message: string;
    author: {
      name?: string | null;
      email?: string | null;
      date?: string | null;
    } | null;
  };
  author: GitHubUser | null;
}

export interface PullRequestReview {
  id: number;
  html_url: string;
  submitted_at?: string | null;
  state: string;
  user: GitHubUser | null;
}

export interface IssueComment {
  id: number;
  html_url: string;
  created_at: string;
  user: GitHubUser | null;
}

export interface Issue {
  number: number;
  html_url: string;
  created_at: string;
  user: GitHubUser | null;
  pull_request?: unknown;
}

export type CommitState = "success" | "failure" | "error" | "pending";

export interface CommitStatus {
  state: CommitState;
  description: string;
  context: string;
  target_url?: string;
}
