import { z } from "zod";
import { ConfigurationError } from "./errors";
import { DEFAULT_ORCID_API_URL } from "./orcid/client";
import type { LookupOptions } from "./orcid/lookup";
import {
  DEFAULT_BOT_BLACKLIST,
  MINIMUM_METADATA_LEVELS,
  parseBotBlacklist,
  type ReconcilePolicy,
} from "./reconcile/policy";

const flag = (defaultValue: boolean) =>
  z
    .enum(["true", "false"])
    .default(defaultValue ? "true" : "false")
    .transform((v) => v === "true");

const policyEnvSchema = z.object({
  CFF_PATH: z.string().min(1).default("CITATION.cff"),
  POST_COMMENT: flag(true),
  AUTHORSHIP_FOR_PR_COMMITS: flag(true),
  AUTHORSHIP_FOR_PR_REVIEWS: flag(true),
  AUTHORSHIP_FOR_PR_ISSUES: flag(true),
  AUTHORSHIP_FOR_PR_ISSUE_COMMENTS: flag(true),
  AUTHORSHIP_FOR_PR_COMMENT: flag(true),
  MISSING_AUTHOR_INVALIDATES_PR: flag(true),
  BOT_BLACKLIST: z.string().default(DEFAULT_BOT_BLACKLIST),
  MIN_AUTHOR_METADATA: z.enum(MINIMUM_METADATA_LEVELS).default("any"),
  ORCID_LOOKUP: flag(true),
  ORCID_API_URL: z.string().url().default(DEFAULT_ORCID_API_URL),
  ORCID_LOOKUP_CONCURRENCY: z.coerce.number().int().positive().default(4),
  ORCID_LOOKUP_RETRIES: z.coerce.number().int().nonnegative().default(2),
});

const configSchema = policyEnvSchema.extend({
  PORT: z.coerce.number().int().positive().default(3000),
  GITHUB_APP_ID: z.coerce.number(),
  GITHUB_APP_PRIVATE_KEY: z.string().min(1),
  GITHUB_WEBHOOK_SECRET: z.string().min(1),
  TARGET_BRANCH: z.string().min(1).optional(),
});

const required = () => z.string({ required_error: "is required" }).min(1, "is required");

const runConfigSchema = policyEnvSchema.extend({
  BASE_BRANCH: required(),
  HEAD_BRANCH: required(),
  EVENTS_PATH: required(),
  GITHUB_OUTPUT: z.string().min(1).optional(),
  COMMENT_PATH: z.string().min(1).optional(),
});

export type PolicyEnv = z.infer<typeof policyEnvSchema>;
export type Config = z.infer<typeof configSchema>;
export type RunConfig = z.infer<typeof runConfigSchema>;

let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = configSchema.parse(process.env);
  }
  return config;
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  return configSchema.parse(env);
}

export function resetConfig(): void {
  config = null;
}

/**
 * Configuration of a one-shot run. Missing or malformed values are a
 * `ConfigurationError`.
 */
export function loadRunConfig(env: Record<string, string | undefined>): RunConfig {
  const parsed = runConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`${issue.path.join(".")} ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Turn environment settings into the explicit policy the engine runs with.
 */
export function buildPolicy(
  env: PolicyEnv,
  branches: { baseBranch: string; headBranch: string },
): ReconcilePolicy {
  if (branches.baseBranch.trim() === "" || branches.headBranch.trim() === "") {
    throw new ConfigurationError("Base and head branch names are required");
  }

  return {
    categories: {
      commits: env.AUTHORSHIP_FOR_PR_COMMITS,
      reviews: env.AUTHORSHIP_FOR_PR_REVIEWS,
      issues: env.AUTHORSHIP_FOR_PR_ISSUES,
      issue_comments: env.AUTHORSHIP_FOR_PR_ISSUE_COMMENTS,
      pr_comments: env.AUTHORSHIP_FOR_PR_COMMENT,
    },
    botBlacklist: parseBotBlacklist(env.BOT_BLACKLIST),
    missingAuthorInvalidatesPr: env.MISSING_AUTHOR_INVALIDATES_PR,
    postComment: env.POST_COMMENT,
    minimumMetadata: env.MIN_AUTHOR_METADATA,
    orcidLookup: env.ORCID_LOOKUP,
    baseBranch: branches.baseBranch,
    headBranch: branches.headBranch,
  };
}

export function lookupOptions(env: PolicyEnv): LookupOptions {
  return {
    concurrency: env.ORCID_LOOKUP_CONCURRENCY,
    retries: env.ORCID_LOOKUP_RETRIES,
    retryDelayMs: 500,
  };
}
