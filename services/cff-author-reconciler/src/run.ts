import { appendFile, readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { readCffText } from "./cff/document";
import { buildPolicy, loadRunConfig, lookupOptions } from "./config";
import { ConfigurationError } from "./errors";
import { contributionEventSchema, type ContributionEvent } from "./events/types";
import { createOrcidClient, type OrcidClient } from "./orcid/client";
import { runPipeline, type PipelineOutput } from "./pipeline";
import { formatActionOutputs } from "./report/outputs";

const eventsFileSchema = z.array(contributionEventSchema);

export async function readEvents(path: string): Promise<ContributionEvent[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`${path} could not be read as JSON: ${(err as Error).message}`);
  }

  const parsed = eventsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`${path} at ${issue.path.join(".")}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * One reconciliation run driven by environment variables, the way the
 * workflow step invokes it. Fatal errors are thrown before any file is
 * written. The citation file is rewritten only when authors were added.
 */
export async function runFromEnv(
  env: Record<string, string | undefined>,
  orcid?: OrcidClient | null,
): Promise<PipelineOutput> {
  const cfg = loadRunConfig(env);
  const policy = buildPolicy(cfg, { baseBranch: cfg.BASE_BRANCH, headBranch: cfg.HEAD_BRANCH });

  const [cffText, events] = await Promise.all([
    readCffText(cfg.CFF_PATH),
    readEvents(cfg.EVENTS_PATH),
  ]);

  const output = await runPipeline({
    events,
    cffText,
    cffPath: cfg.CFF_PATH,
    policy,
    orcid: orcid === undefined ? createOrcidClient(cfg.ORCID_API_URL) : orcid,
    lookup: lookupOptions(cfg),
  });

  const { report } = output;
  if (report.new_authors.length > 0) {
    await writeFile(cfg.CFF_PATH, report.updated_cff, "utf8");
  }
  if (cfg.GITHUB_OUTPUT) {
    await appendFile(cfg.GITHUB_OUTPUT, formatActionOutputs(report), "utf8");
  }
  if (cfg.COMMENT_PATH && policy.postComment) {
    await writeFile(cfg.COMMENT_PATH, output.comment, "utf8");
  }

  return output;
}
