import type { AuthorRecord } from "../cff/types";
import type { NormalizedContributor } from "../identity/types";

export type MatchTier = "identifier" | "email" | "name";
export type MatchConfidence = "exact" | "heuristic";
export type RecordProvenance = "display-name" | "username" | "placeholder";

/**
 * A contributor as the matcher sees it: its own evidence plus any ORCID
 * attached by an external lookup.
 */
export interface MatchSubject {
  contributor: NormalizedContributor;
  orcids: readonly string[];
}

export type StrategyVerdict =
  | {
      kind: "match";
      authorIndex: number;
      tier: MatchTier;
      confidence: MatchConfidence;
    }
  | { kind: "no-opinion" };

export interface MatchStrategy {
  readonly tier: MatchTier;
  evaluate(subject: MatchSubject, authors: readonly AuthorRecord[]): StrategyVerdict;
}

export interface MatchedResult {
  status: "matched";
  contributor: NormalizedContributor;
  author: AuthorRecord;
  authorIndex: number;
  tier: MatchTier;
  confidence: MatchConfidence;
}

export interface NewResult {
  status: "new";
  contributor: NormalizedContributor;
  record: AuthorRecord;
  provenance: RecordProvenance;
  /** Reviewer-facing remarks about what the record lacks. */
  notes: string[];
}

export interface UnmatchedResult {
  status: "unmatched";
  contributor: NormalizedContributor;
  reason: string;
}

export type MatchResult = MatchedResult | NewResult | UnmatchedResult;
