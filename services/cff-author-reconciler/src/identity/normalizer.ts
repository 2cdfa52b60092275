import type { ContributionEvent } from "../events/types";
import {
  collapseWhitespace,
  foldName,
  loginsOf,
  normalizeEmail,
} from "../matching/names";
import { parseOrcid } from "../orcid/identifier";
import { DisjointSet } from "./union-find";
import type { NormalizedContributor } from "./types";

interface IdentitySignals {
  usernames: string[];
  email: string | null;
  orcid: string | null;
  displayName: string | null;
}

function signalsOf(event: ContributionEvent): IdentitySignals {
  const { email, orcid, displayName } = event.identity;

  return {
    usernames: loginsOf(event.identity),
    email: email && email.trim() !== "" ? normalizeEmail(email) : null,
    orcid: orcid ? parseOrcid(orcid) : null,
    displayName:
      displayName && displayName.trim() !== "" ? collapseWhitespace(displayName) : null,
  };
}

function hasAccountSignal(signals: IdentitySignals): boolean {
  return signals.usernames.length > 0 || signals.email !== null || signals.orcid !== null;
}

function pushUnique(values: string[], value: string | null): void {
  if (value !== null && !values.includes(value)) {
    values.push(value);
  }
}

function deriveKey(
  contributor: Omit<NormalizedContributor, "key">,
  first: ContributionEvent,
): string {
  if (contributor.usernames.length > 0) return contributor.usernames[0];
  if (contributor.emails.length > 0) return `email:${contributor.emails[0]}`;
  if (contributor.orcids.length > 0) return `orcid:${contributor.orcids[0]}`;
  if (contributor.displayNames.length > 0) {
    return `name:${foldName(contributor.displayNames[0])}`;
  }
  return `unidentified:${first.kind}:${first.sourceRef}`;
}

/**
 * Fold events into canonical contributors. Events sharing a username, an
 * email or an ORCID end up in the same contributor, transitively.
 * Identities that carry nothing but a display name only merge with other
 * such identities of the same folded name.
 *
 * Output is ordered by each contributor's first event; evidence keeps the
 * input order.
 */
export function normalizeContributors(
  events: readonly ContributionEvent[],
): NormalizedContributor[] {
  const signals = events.map(signalsOf);
  const sets = new DisjointSet(events.length);
  const owners = new Map<string, number>();

  const claim = (attribute: string, index: number): void => {
    const owner = owners.get(attribute);
    if (owner === undefined) {
      owners.set(attribute, index);
    } else {
      sets.union(owner, index);
    }
  };

  signals.forEach((s, index) => {
    for (const username of s.usernames) claim(`username:${username}`, index);
    if (s.email) claim(`email:${s.email}`, index);
    if (s.orcid) claim(`orcid:${s.orcid}`, index);
    if (!hasAccountSignal(s) && s.displayName) {
      claim(`name:${foldName(s.displayName)}`, index);
    }
  });

  return sets.groups().map((members) => {
    const usernames: string[] = [];
    const emails: string[] = [];
    const orcids: string[] = [];
    const displayNames: string[] = [];

    for (const index of members) {
      const s = signals[index];
      for (const username of s.usernames) pushUnique(usernames, username);
      pushUnique(emails, s.email);
      pushUnique(orcids, s.orcid);
      pushUnique(displayNames, s.displayName);
    }

    const evidence = members.map((index) => events[index]);
    const entity = evidence.some((event) => event.identity.entity === true);
    const partial = { usernames, emails, orcids, displayNames, entity, evidence };
    return { key: deriveKey(partial, evidence[0]), ...partial };
  });
}

/**
 * Earliest evidence timestamp in epoch milliseconds. Unparseable
 * timestamps sort last.
 */
export function firstSeenAt(contributor: NormalizedContributor): number {
  let earliest = Number.POSITIVE_INFINITY;
  for (const event of contributor.evidence) {
    const at = Date.parse(event.timestamp);
    if (!Number.isNaN(at) && at < earliest) {
      earliest = at;
    }
  }
  return earliest;
}

export function compareContributors(
  a: NormalizedContributor,
  b: NormalizedContributor,
): number {
  const byTime = firstSeenAt(a) - firstSeenAt(b);
  if (byTime !== 0 && !Number.isNaN(byTime)) {
    return byTime;
  }
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}
