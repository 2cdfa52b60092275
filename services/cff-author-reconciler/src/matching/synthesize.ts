import type { AuthorRecord } from "../cff/types";
import { toOrcidUrl } from "../orcid/identifier";
import type { MinimumMetadata } from "../reconcile/policy";
import { collapseWhitespace, isNoreplyEmail, profileUrl, splitFullName } from "./names";
import type { MatchSubject, RecordProvenance } from "./types";

export type SynthesisOutcome =
  | { ok: true; record: AuthorRecord; provenance: RecordProvenance; notes: string[] }
  | { ok: false; reason: string };

interface AvailableMetadata {
  name: string | null;
  username: string | null;
  email: string | null;
  orcid: string | null;
}

function availableMetadata(subject: MatchSubject): AvailableMetadata {
  const { contributor } = subject;
  const username = contributor.usernames[0] ?? null;
  return {
    name: contributor.displayNames[0] ?? username,
    username,
    email: contributor.emails.find((email) => !isNoreplyEmail(email)) ?? null,
    orcid: subject.orcids[0] ?? null,
  };
}

function missingMinimum(meta: AvailableMetadata, minimum: MinimumMetadata): string | null {
  switch (minimum) {
    case "any":
      return meta.name || meta.email || meta.orcid
        ? null
        : "no usable identity signal (name, email or ORCID)";
    case "name":
      return meta.name ? null : "no name or username to build an author record from";
    case "name-and-contact":
      if (!meta.name) return "no name or username to build an author record from";
      return meta.email || meta.orcid ? null : "no email or ORCID to accompany the name";
  }
}

/**
 * Build a new author record for a contributor no existing entry matched,
 * provided the contributor meets the minimum-metadata policy.
 */
export function synthesizeAuthor(
  subject: MatchSubject,
  minimum: MinimumMetadata,
): SynthesisOutcome {
  const meta = availableMetadata(subject);
  const missing = missingMinimum(meta, minimum);
  if (missing) {
    return { ok: false, reason: missing };
  }

  const record: AuthorRecord = {};
  const notes: string[] = [];
  let provenance: RecordProvenance;

  if (meta.name) {
    const split = splitFullName(meta.name);
    if (subject.contributor.entity) {
      record.name = collapseWhitespace(meta.name);
    } else if (split) {
      record["given-names"] = split.givenNames;
      record["family-names"] = split.familyNames;
    } else {
      record.name = collapseWhitespace(meta.name);
      notes.push("only one name part found, added as an entity");
    }
    provenance = subject.contributor.displayNames.length > 0 ? "display-name" : "username";
  } else {
    record.name = meta.email ?? (meta.orcid ? toOrcidUrl(meta.orcid) : "unknown");
    notes.push("no name found, placeholder name used");
    provenance = "placeholder";
  }

  if (meta.username) record.alias = profileUrl(meta.username);
  if (meta.email) record.email = meta.email;
  if (meta.orcid) record.orcid = toOrcidUrl(meta.orcid);

  if (!meta.email && !meta.orcid) {
    notes.push("no email or ORCID found");
  } else if (!meta.orcid) {
    notes.push("no ORCID found");
  }

  return { ok: true, record, provenance, notes };
}
