import { loginsOf } from "../matching/names";
import type { ReconcilePolicy } from "../reconcile/policy";
import { categoryOf, type ContributionEvent } from "./types";

export function isBlacklisted(
  event: ContributionEvent,
  botBlacklist: readonly string[],
): boolean {
  return loginsOf(event.identity).some((login) => botBlacklist.includes(login));
}

/**
 * Drop events from disabled categories and from blacklisted bot accounts,
 * whether the account is named directly or through a noreply address.
 * A disabled category behaves exactly as if its events never happened.
 */
export function selectQualifyingEvents(
  events: readonly ContributionEvent[],
  policy: Pick<ReconcilePolicy, "categories" | "botBlacklist">,
): ContributionEvent[] {
  return events.filter(
    (event) =>
      policy.categories[categoryOf(event)] &&
      !isBlacklisted(event, policy.botBlacklist),
  );
}
