export const DEFAULT_ORCID_API_URL = "https://pub.orcid.org/v3.0";

export interface OrcidQuery {
  email?: string;
  givenNames?: string;
  familyNames?: string;
}

/**
 * Client for the public ORCID registry search.
 */
export interface OrcidClient {
  /** Candidate ORCID ids for the query. Throws on transport or HTTP errors. */
  search(query: OrcidQuery): Promise<string[]>;
}

interface ExpandedSearchResponse {
  "expanded-result": Array<{ "orcid-id"?: string }> | null;
  "num-found"?: number;
}

function quote(value: string): string {
  return `"${value.replace(/["\\]/g, "\\$&")}"`;
}

export function buildSearchQuery(query: OrcidQuery): string {
  const clauses: string[] = [];
  if (query.email) {
    clauses.push(`email:${quote(query.email)}`);
  }
  if (query.givenNames) {
    clauses.push(`given-names:${quote(query.givenNames)}`);
  }
  if (query.familyNames) {
    clauses.push(`family-names:${quote(query.familyNames)}`);
  }
  return clauses.join(" AND ");
}

export function createOrcidClient(baseUrl: string = DEFAULT_ORCID_API_URL): OrcidClient {
  return {
    async search(query: OrcidQuery): Promise<string[]> {
      const q = buildSearchQuery(query);
      const url = `${baseUrl}/expanded-search/?q=${encodeURIComponent(q)}&rows=10`;
      const res = await fetch(url, {
        headers: { Accept: "application/json" },
      });

      if (!res.ok) {
        throw new Error(`ORCID search failed (${res.status})`);
      }

      const body = (await res.json()) as ExpandedSearchResponse;
      return (body["expanded-result"] ?? [])
        .map((result) => result["orcid-id"])
        .filter((id): id is string => typeof id === "string" && id !== "");
    },
  };
}
