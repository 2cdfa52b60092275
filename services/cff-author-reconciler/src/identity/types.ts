import type { ContributionEvent } from "../events/types";

/**
 * The canonical identity behind one or more events. All lists are
 * de-duplicated and kept in first-seen order.
 */
export interface NormalizedContributor {
  key: string;
  /** Case-folded logins. */
  usernames: string[];
  /** Lower-cased addresses, noreply addresses included. */
  emails: string[];
  /** Bare, checksum-valid ORCID ids. */
  orcids: string[];
  displayNames: string[];
  /** Some evidence comes from an organization account. */
  entity: boolean;
  evidence: ContributionEvent[];
}
