import { appendAuthors } from "../cff/document";
import type { AuthorRecord, CffDocument } from "../cff/types";
import { selectQualifyingEvents } from "../events/filter";
import type { ContributionEvent } from "../events/types";
import { compareContributors, normalizeContributors } from "../identity/normalizer";
import type { NormalizedContributor } from "../identity/types";
import { findExistingAuthor, matchContributor } from "../matching/matcher";
import type { MatchedResult, NewResult, UnmatchedResult } from "../matching/types";
import type { OrcidClient } from "../orcid/client";
import { parseOrcid } from "../orcid/identifier";
import {
  DEFAULT_LOOKUP_OPTIONS,
  lookupIdentifiers,
  type LookupOptions,
  type LookupResult,
  type OrcidLog,
} from "../orcid/lookup";
import type { ReconcilePolicy } from "./policy";

export interface Warning {
  /** Contributor key or event reference. */
  subject: string;
  reason: string;
}

export interface ReconcileInput {
  events: readonly ContributionEvent[];
  cff: CffDocument;
  policy: ReconcilePolicy;
  orcid?: OrcidClient | null;
  lookup?: LookupOptions;
}

export interface ReconcileResult {
  /** Every contributor, in processing order. */
  contributors: NormalizedContributor[];
  matched: MatchedResult[];
  added: NewResult[];
  unmatched: UnmatchedResult[];
  warnings: Warning[];
  orcidLogs: OrcidLog[];
  /** The input document with `added` appended. */
  cff: CffDocument;
}

function invalidOrcidWarnings(contributor: NormalizedContributor): Warning[] {
  const seen = new Set<string>();
  const warnings: Warning[] = [];
  for (const event of contributor.evidence) {
    const raw = event.identity.orcid;
    if (raw && parseOrcid(raw) === null && !seen.has(raw)) {
      seen.add(raw);
      warnings.push({ subject: contributor.key, reason: `ORCID \`${raw}\` is invalid and was ignored` });
    }
  }
  return warnings;
}

function lookupWarnings(lookup: LookupResult | undefined): Warning[] {
  if (!lookup) return [];
  return lookup.logs
    .filter((log) => log.outcome === "ambiguous" || log.outcome === "error")
    .map((log) => ({
      subject: log.contributor,
      reason:
        log.outcome === "ambiguous"
          ? `ORCID lookup was ambiguous (${log.message ?? log.query})`
          : `ORCID lookup failed: ${log.message ?? "unknown error"}`,
    }));
}

/**
 * Events → contributors → match/synthesize, in a deterministic order.
 *
 * Contributors are processed by earliest evidence, ties broken by key.
 * Only contributors no existing author matches locally are looked up in
 * the ORCID registry. Each contributor is matched against the existing
 * authors plus those appended earlier in the same run, so two contributors
 * describing the same person yield one record.
 */
export async function reconcile(input: ReconcileInput): Promise<ReconcileResult> {
  const { policy, cff } = input;

  const qualifying = selectQualifyingEvents(input.events, policy);
  const contributors = normalizeContributors(qualifying).sort(compareContributors);

  const pending = contributors.filter(
    (contributor) =>
      findExistingAuthor({ contributor, orcids: contributor.orcids }, cff.authors) === null,
  );

  const lookups =
    policy.orcidLookup && input.orcid
      ? await lookupIdentifiers(pending, input.orcid, input.lookup ?? DEFAULT_LOOKUP_OPTIONS)
      : new Map<string, LookupResult>();

  const pool: AuthorRecord[] = [...cff.authors];
  const matched: MatchedResult[] = [];
  const added: NewResult[] = [];
  const unmatched: UnmatchedResult[] = [];
  const warnings: Warning[] = [];
  const orcidLogs: OrcidLog[] = [];

  for (const contributor of contributors) {
    const lookup = lookups.get(contributor.key);
    if (lookup) {
      orcidLogs.push(...lookup.logs);
    }

    const orcids = lookup?.orcid ? [...contributor.orcids, lookup.orcid] : contributor.orcids;
    const result = matchContributor({ contributor, orcids }, pool, policy.minimumMetadata);

    warnings.push(...invalidOrcidWarnings(contributor));
    warnings.push(...lookupWarnings(lookup));

    switch (result.status) {
      case "matched":
        matched.push(result);
        break;
      case "new":
        pool.push(result.record);
        added.push(result);
        warnings.push(
          ...result.notes.map((note) => ({ subject: contributor.key, reason: note })),
        );
        break;
      case "unmatched":
        unmatched.push(result);
        warnings.push({ subject: contributor.key, reason: `not added: ${result.reason}` });
        break;
    }
  }

  return {
    contributors,
    matched,
    added,
    unmatched,
    warnings,
    orcidLogs,
    cff: appendAuthors(cff, added.map((result) => result.record)),
  };
}
