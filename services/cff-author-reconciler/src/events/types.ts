import { z } from "zod";

export const CONTRIBUTION_KINDS = [
  "commit",
  "commit-co-author",
  "review",
  "issue-creation",
  "issue-comment",
  "pr-comment",
] as const;

export type ContributionKind = (typeof CONTRIBUTION_KINDS)[number];

export const CONTRIBUTION_CATEGORIES = [
  "commits",
  "reviews",
  "issues",
  "issue_comments",
  "pr_comments",
] as const;

export type ContributionCategory = (typeof CONTRIBUTION_CATEGORIES)[number];

export const CATEGORY_BY_KIND: Record<ContributionKind, ContributionCategory> = {
  commit: "commits",
  "commit-co-author": "commits",
  review: "reviews",
  "issue-creation": "issues",
  "issue-comment": "issue_comments",
  "pr-comment": "pr_comments",
};

/**
 * Identity signals carried by one event. Any of them may be missing:
 * a co-author trailer has no username, an unlinked commit author has no
 * platform account, a review has no email.
 */
export interface RawIdentity {
  username?: string;
  displayName?: string;
  email?: string;
  orcid?: string;
  /** The account is an organization: its name is kept whole. */
  entity?: boolean;
}

export interface ContributionEvent {
  readonly kind: ContributionKind;
  readonly identity: Readonly<RawIdentity>;
  /** Commit SHA, review id, issue number or comment id. */
  readonly sourceRef: string;
  readonly url?: string;
  /** ISO-8601 */
  readonly timestamp: string;
}

const optionalText = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional();

export const rawIdentitySchema = z.object({
  username: optionalText,
  displayName: optionalText,
  email: optionalText,
  orcid: optionalText,
  entity: z.boolean().optional(),
});

export const contributionEventSchema = z.object({
  kind: z.enum(CONTRIBUTION_KINDS),
  identity: rawIdentitySchema,
  sourceRef: z.string().min(1),
  url: z.string().url().optional(),
  timestamp: z.string().datetime({ offset: true }),
});

export function categoryOf(event: ContributionEvent): ContributionCategory {
  return CATEGORY_BY_KIND[event.kind];
}
