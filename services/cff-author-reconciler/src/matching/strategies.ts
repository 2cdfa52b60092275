import { authorKind, displayNameOf, type AuthorRecord } from "../cff/types";
import { parseOrcid } from "../orcid/identifier";
import { foldName, normalizeAlias, normalizeEmail } from "./names";
import type { MatchStrategy, MatchSubject, StrategyVerdict } from "./types";

const NO_OPINION: StrategyVerdict = { kind: "no-opinion" };

function firstIndex(
  authors: readonly AuthorRecord[],
  predicate: (author: AuthorRecord) => boolean,
): number {
  return authors.findIndex(predicate);
}

export const identifierStrategy: MatchStrategy = {
  tier: "identifier",
  evaluate(subject, authors) {
    if (subject.orcids.length === 0) return NO_OPINION;

    const index = firstIndex(authors, (author) => {
      const orcid = author.orcid ? parseOrcid(author.orcid) : null;
      return orcid !== null && subject.orcids.includes(orcid);
    });
    return index === -1
      ? NO_OPINION
      : { kind: "match", authorIndex: index, tier: "identifier", confidence: "exact" };
  },
};

export const emailStrategy: MatchStrategy = {
  tier: "email",
  evaluate(subject, authors) {
    const emails = subject.contributor.emails;
    if (emails.length === 0) return NO_OPINION;

    const index = firstIndex(
      authors,
      (author) => author.email !== undefined && emails.includes(normalizeEmail(author.email)),
    );
    return index === -1
      ? NO_OPINION
      : { kind: "match", authorIndex: index, tier: "email", confidence: "exact" };
  },
};

function matchesByName(subject: MatchSubject, author: AuthorRecord): boolean {
  const { displayNames, usernames } = subject.contributor;

  const authorName = foldName(displayNameOf(author));
  if (authorName !== "") {
    if (displayNames.some((name) => foldName(name) === authorName)) {
      return true;
    }
    // Records synthesized from a bare login carry it as the entity name.
    if (authorKind(author) === "entity" && usernames.includes(authorName)) {
      return true;
    }
  }

  if (author.alias !== undefined) {
    const alias = normalizeAlias(author.alias);
    if (alias !== "" && usernames.includes(alias)) {
      return true;
    }
  }

  return false;
}

export const nameStrategy: MatchStrategy = {
  tier: "name",
  evaluate(subject, authors) {
    const index = firstIndex(authors, (author) => matchesByName(subject, author));
    return index === -1
      ? NO_OPINION
      : { kind: "match", authorIndex: index, tier: "name", confidence: "heuristic" };
  },
};

/**
 * Evaluated in order; the first strategy with an opinion decides.
 */
export const MATCH_STRATEGIES: readonly MatchStrategy[] = [
  identifierStrategy,
  emailStrategy,
  nameStrategy,
];
