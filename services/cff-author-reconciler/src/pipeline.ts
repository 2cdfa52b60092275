import { loadCff } from "./cff/document";
import type { ContributionEvent } from "./events/types";
import type { OrcidClient } from "./orcid/client";
import type { LookupOptions } from "./orcid/lookup";
import { reconcile } from "./reconcile/engine";
import type { ReconcilePolicy } from "./reconcile/policy";
import { decideValidity } from "./reconcile/verdict";
import { buildReport, type ReconciliationReport } from "./report/builder";
import { renderComment } from "./report/comment";

export interface PipelineInput {
  events: readonly ContributionEvent[];
  cffText: string;
  cffPath: string;
  policy: ReconcilePolicy;
  orcid: OrcidClient | null;
  lookup?: LookupOptions;
}

export interface PipelineOutput {
  report: ReconciliationReport;
  /** Markdown for the pull request comment. */
  comment: string;
}

/**
 * Load → reconcile → decide → report. Throws `CffDocumentError` before
 * producing anything when the citation file is unusable.
 */
export async function runPipeline(input: PipelineInput): Promise<PipelineOutput> {
  const cff = loadCff(input.cffText);

  const result = await reconcile({
    events: input.events,
    cff,
    policy: input.policy,
    orcid: input.orcid,
    lookup: input.lookup,
  });

  const verdict = decideValidity(result, input.policy.missingAuthorInvalidatesPr);
  const report = buildReport(result, verdict);

  return {
    report,
    comment: renderComment(report, {
      cffPath: input.cffPath,
      baseBranch: input.policy.baseBranch,
      headBranch: input.policy.headBranch,
    }),
  };
}
