import type { ContributionCategory } from "../events/types";

/**
 * What a contributor must offer before a new author record is synthesized
 * for them:
 * - `any`: a name, an email or an ORCID
 * - `name`: a name (display name or username)
 * - `name-and-contact`: a name plus an email or an ORCID
 */
export type MinimumMetadata = "any" | "name" | "name-and-contact";

export const MINIMUM_METADATA_LEVELS = [
  "any",
  "name",
  "name-and-contact",
] as const satisfies readonly MinimumMetadata[];

export interface ReconcilePolicy {
  categories: Record<ContributionCategory, boolean>;
  /** Case-folded usernames whose events are ignored. */
  botBlacklist: readonly string[];
  missingAuthorInvalidatesPr: boolean;
  postComment: boolean;
  minimumMetadata: MinimumMetadata;
  orcidLookup: boolean;
  baseBranch: string;
  headBranch: string;
}

export const DEFAULT_BOT_BLACKLIST = "github-actions[bot]";

export function parseBotBlacklist(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry !== "");
}

export function allCategoriesEnabled(): Record<ContributionCategory, boolean> {
  return {
    commits: true,
    reviews: true,
    issues: true,
    issue_comments: true,
    pr_comments: true,
  };
}

export function defaultPolicy(
  branches: { baseBranch: string; headBranch: string },
  overrides: Partial<ReconcilePolicy> = {},
): ReconcilePolicy {
  return {
    categories: allCategoriesEnabled(),
    botBlacklist: parseBotBlacklist(DEFAULT_BOT_BLACKLIST),
    missingAuthorInvalidatesPr: true,
    postComment: true,
    minimumMetadata: "any",
    orcidLookup: true,
    ...branches,
    ...overrides,
  };
}
