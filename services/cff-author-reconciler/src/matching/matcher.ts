import type { AuthorRecord } from "../cff/types";
import type { MinimumMetadata } from "../reconcile/policy";
import { MATCH_STRATEGIES } from "./strategies";
import { synthesizeAuthor } from "./synthesize";
import type { MatchResult, MatchStrategy, MatchSubject, MatchedResult } from "./types";

/**
 * Run the tiers only. Returns null when no strategy has an opinion.
 */
export function findExistingAuthor(
  subject: MatchSubject,
  authors: readonly AuthorRecord[],
  strategies: readonly MatchStrategy[] = MATCH_STRATEGIES,
): MatchedResult | null {
  for (const strategy of strategies) {
    const verdict = strategy.evaluate(subject, authors);
    if (verdict.kind === "match") {
      return {
        status: "matched",
        contributor: subject.contributor,
        author: authors[verdict.authorIndex],
        authorIndex: verdict.authorIndex,
        tier: verdict.tier,
        confidence: verdict.confidence,
      };
    }
  }
  return null;
}

/**
 * Decide whether a contributor is already an author, can be added as a
 * new one, or lacks the metadata to be added.
 */
export function matchContributor(
  subject: MatchSubject,
  authors: readonly AuthorRecord[],
  minimum: MinimumMetadata,
): MatchResult {
  const existing = findExistingAuthor(subject, authors);
  if (existing) {
    return existing;
  }

  const synthesized = synthesizeAuthor(subject, minimum);
  if (!synthesized.ok) {
    return {
      status: "unmatched",
      contributor: subject.contributor,
      reason: synthesized.reason,
    };
  }

  return {
    status: "new",
    contributor: subject.contributor,
    record: synthesized.record,
    provenance: synthesized.provenance,
    notes: synthesized.notes,
  };
}
