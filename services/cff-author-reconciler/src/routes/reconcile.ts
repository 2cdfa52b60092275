import { Hono } from "hono";
import { z } from "zod";
import { getConfig, lookupOptions } from "../config";
import { CffDocumentError } from "../errors";
import { contributionEventSchema } from "../events/types";
import { createOrcidClient } from "../orcid/client";
import { runPipeline } from "../pipeline";
import {
  DEFAULT_BOT_BLACKLIST,
  MINIMUM_METADATA_LEVELS,
  parseBotBlacklist,
  type ReconcilePolicy,
} from "../reconcile/policy";

const runConfigSchema = z.object({
  base_branch: z.string().min(1),
  head_branch: z.string().min(1),
  post_comment: z.boolean().default(true),
  authorship_for_pr_commits: z.boolean().default(true),
  authorship_for_pr_reviews: z.boolean().default(true),
  authorship_for_pr_issues: z.boolean().default(true),
  authorship_for_pr_issue_comments: z.boolean().default(true),
  authorship_for_pr_comment: z.boolean().default(true),
  missing_author_invalidates_pr: z.boolean().default(true),
  bot_blacklist: z.string().default(DEFAULT_BOT_BLACKLIST),
  min_author_metadata: z.enum(MINIMUM_METADATA_LEVELS).default("any"),
  orcid_lookup: z.boolean().default(true),
});

export const reconcileRequestSchema = z.object({
  events: z.array(contributionEventSchema),
  cff: z.string(),
  cff_path: z.string().min(1).default("CITATION.cff"),
  config: runConfigSchema,
});

export function policyFromRunConfig(run: z.infer<typeof runConfigSchema>): ReconcilePolicy {
  return {
    categories: {
      commits: run.authorship_for_pr_commits,
      reviews: run.authorship_for_pr_reviews,
      issues: run.authorship_for_pr_issues,
      issue_comments: run.authorship_for_pr_issue_comments,
      pr_comments: run.authorship_for_pr_comment,
    },
    botBlacklist: parseBotBlacklist(run.bot_blacklist),
    missingAuthorInvalidatesPr: run.missing_author_invalidates_pr,
    postComment: run.post_comment,
    minimumMetadata: run.min_author_metadata,
    orcidLookup: run.orcid_lookup,
    baseBranch: run.base_branch,
    headBranch: run.head_branch,
  };
}

const reconcileRoute = new Hono();

/**
 * POST /reconcile
 * Reconcile already-collected contribution events against a citation file.
 * Responds with the full report; the comment is included when
 * `post_comment` is set so the caller can publish it.
 */
reconcileRoute.post("/reconcile", async (c) => {
  const config = getConfig();

  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: "Request body must be JSON" }, 400);
  }

  const parsed = reconcileRequestSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: "Invalid request", issues: parsed.error.issues }, 400);
  }

  const request = parsed.data;
  const policy = policyFromRunConfig(request.config);

  try {
    const { report, comment } = await runPipeline({
      events: request.events,
      cffText: request.cff,
      cffPath: request.cff_path,
      policy,
      orcid: createOrcidClient(config.ORCID_API_URL),
      lookup: lookupOptions(config),
    });

    return c.json({ ...report, comment: policy.postComment ? comment : null });
  } catch (err) {
    if (err instanceof CffDocumentError) {
      console.error(`Reconciliation aborted: ${err.message}`);
      return c.json({ error: err.message }, 422);
    }
    throw err;
  }
});

export { reconcileRoute };
