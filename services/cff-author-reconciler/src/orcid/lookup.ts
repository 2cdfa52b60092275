import type { NormalizedContributor } from "../identity/types";
import { isNoreplyEmail, splitFullName } from "../matching/names";
import { buildSearchQuery, type OrcidClient, type OrcidQuery } from "./client";
import { parseOrcid } from "./identifier";

export type OrcidLookupOutcome = "success" | "ambiguous" | "not-found" | "error";

export interface OrcidLog {
  contributor: string;
  query: string;
  outcome: OrcidLookupOutcome;
  orcid: string | null;
  message?: string;
}

export interface LookupResult {
  orcid: string | null;
  logs: OrcidLog[];
}

export interface LookupOptions {
  concurrency: number;
  retries: number;
  retryDelayMs: number;
}

export const DEFAULT_LOOKUP_OPTIONS: LookupOptions = {
  concurrency: 4,
  retries: 2,
  retryDelayMs: 500,
};

export function lookupQueries(contributor: NormalizedContributor): OrcidQuery[] {
  const queries: OrcidQuery[] = [];

  const email = contributor.emails.find((e) => !isNoreplyEmail(e));
  if (email) {
    queries.push({ email });
  }

  const name = contributor.displayNames.map(splitFullName).find((s) => s !== null);
  if (name) {
    queries.push({ givenNames: name.givenNames, familyNames: name.familyNames });
  }

  return queries;
}

async function searchWithRetry(
  client: OrcidClient,
  query: OrcidQuery,
  options: LookupOptions,
): Promise<string[]> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await client.search(query);
    } catch (err) {
      if (attempt >= options.retries) {
        throw err;
      }
      console.warn(
        `ORCID search failed (attempt ${attempt + 1}/${options.retries + 1}), retrying in ${options.retryDelayMs}ms...`,
      );
      await new Promise((r) => setTimeout(r, options.retryDelayMs));
    }
  }
}

async function lookupOne(
  contributor: NormalizedContributor,
  client: OrcidClient,
  options: LookupOptions,
): Promise<LookupResult> {
  const logs: OrcidLog[] = [];

  for (const query of lookupQueries(contributor)) {
    const entry = { contributor: contributor.key, query: buildSearchQuery(query) };

    let candidates: string[];
    try {
      candidates = await searchWithRetry(client, query, options);
    } catch (err) {
      logs.push({ ...entry, outcome: "error", orcid: null, message: (err as Error).message });
      continue;
    }

    const distinct = Array.from(new Set(candidates));
    if (distinct.length === 0) {
      logs.push({ ...entry, outcome: "not-found", orcid: null });
      continue;
    }
    if (distinct.length > 1) {
      logs.push({
        ...entry,
        outcome: "ambiguous",
        orcid: null,
        message: `${distinct.length} candidates: ${distinct.join(", ")}`,
      });
      continue;
    }

    const orcid = parseOrcid(distinct[0]);
    if (!orcid) {
      logs.push({
        ...entry,
        outcome: "not-found",
        orcid: null,
        message: `registry returned an invalid id ${distinct[0]}`,
      });
      continue;
    }

    logs.push({ ...entry, outcome: "success", orcid });
    return { orcid, logs };
  }

  return { orcid: null, logs };
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Results
 * keep the order of `items` whatever the completion order.
 */
async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const runners = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    async () => {
      while (next < items.length) {
        const index = next++;
        results[index] = await worker(items[index]);
      }
    },
  );

  await Promise.all(runners);
  return results;
}

/**
 * Query the ORCID registry for contributors that carry no identifier of
 * their own. Failures never throw; they come back as `error` logs.
 */
export async function lookupIdentifiers(
  contributors: readonly NormalizedContributor[],
  client: OrcidClient,
  options: LookupOptions = DEFAULT_LOOKUP_OPTIONS,
): Promise<Map<string, LookupResult>> {
  const eligible = contributors.filter(
    (c) => c.orcids.length === 0 && lookupQueries(c).length > 0,
  );

  const results = await mapWithConcurrency(eligible, options.concurrency, (c) =>
    lookupOne(c, client, options),
  );

  const byKey = new Map<string, LookupResult>();
  eligible.forEach((c, i) => byKey.set(c.key, results[i]));
  return byKey;
}
