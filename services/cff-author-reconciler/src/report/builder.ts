import { serializeCff } from "../cff/document";
import type { AuthorRecord } from "../cff/types";
import {
  categoryOf,
  type ContributionCategory,
  type ContributionEvent,
  type ContributionKind,
} from "../events/types";
import type { NormalizedContributor } from "../identity/types";
import type { RecordProvenance } from "../matching/types";
import type { OrcidLog } from "../orcid/lookup";
import type { ReconcileResult, Warning } from "../reconcile/engine";
import type { ValidityVerdict } from "../reconcile/verdict";

/** Order in which a contributor's qualifying category is reported. */
export const CATEGORY_PRIORITY: readonly ContributionCategory[] = [
  "commits",
  "pr_comments",
  "reviews",
  "issues",
  "issue_comments",
];

export interface EvidenceEntry {
  kind: ContributionKind;
  category: ContributionCategory;
  ref: string;
  url: string | null;
  timestamp: string;
}

export interface NewAuthorEntry {
  contributor: string;
  author: AuthorRecord;
  category: ContributionCategory;
  provenance: RecordProvenance;
  evidence: EvidenceEntry[];
}

export interface UnmatchedEntry {
  contributor: string;
  reason: string;
  evidence: EvidenceEntry[];
}

export interface ReconciliationReport {
  new_authors: NewAuthorEntry[];
  unmatched: UnmatchedEntry[];
  updated_cff: string;
  warnings: Warning[];
  orcid_logs: OrcidLog[];
  verdict: ValidityVerdict;
}

function toEvidence(event: ContributionEvent): EvidenceEntry {
  return {
    kind: event.kind,
    category: categoryOf(event),
    ref: event.sourceRef,
    url: event.url ?? null,
    timestamp: event.timestamp,
  };
}

export function qualifyingCategory(contributor: NormalizedContributor): ContributionCategory {
  const categories = new Set(contributor.evidence.map(categoryOf));
  const first = CATEGORY_PRIORITY.find((category) => categories.has(category));
  return first ?? categoryOf(contributor.evidence[0]);
}

/**
 * Assemble the output contract. Every new or unmatched contributor
 * carries its full evidence trail.
 */
export function buildReport(
  result: ReconcileResult,
  verdict: ValidityVerdict,
): ReconciliationReport {
  return {
    new_authors: result.added.map((added) => ({
      contributor: added.contributor.key,
      author: added.record,
      category: qualifyingCategory(added.contributor),
      provenance: added.provenance,
      evidence: added.contributor.evidence.map(toEvidence),
    })),
    unmatched: result.unmatched.map((u) => ({
      contributor: u.contributor.key,
      reason: u.reason,
      evidence: u.contributor.evidence.map(toEvidence),
    })),
    updated_cff: serializeCff(result.cff),
    warnings: result.warnings,
    orcid_logs: result.orcidLogs,
    verdict,
  };
}
