import { describe, it, expect, vi } from "vitest";
import { reconcile } from "./engine";
import { decideValidity } from "./verdict";
import { defaultPolicy, parseBotBlacklist, type ReconcilePolicy } from "./policy";
import { loadCff, serializeCff } from "../cff/document";
import { buildReport } from "../report/builder";
import type { ContributionEvent } from "../events/types";
import type { OrcidClient, OrcidQuery } from "../orcid/client";

const EMPTY_CFF = "cff-version: 1.2.0\ntitle: Demo\nauthors: []\n";
const lookup = { concurrency: 2, retries: 0, retryDelayMs: 0 };

function policy(overrides: Partial<ReconcilePolicy> = {}): ReconcilePolicy {
  return defaultPolicy({ baseBranch: "main", headBranch: "feature" }, overrides);
}

function at(minute: number): string {
  return `2024-05-01T10:${String(minute).padStart(2, "0")}:00Z`;
}

describe("reconcile", () => {
  it("adds a commit author as a new record and passes", async () => {
    const events: ContributionEvent[] = [
      { kind: "commit", identity: { username: "alice", email: "a@x.org" }, sourceRef: "abc1234", timestamp: at(0) },
    ];
    const result = await reconcile({ events, cff: loadCff(EMPTY_CFF), policy: policy() });

    expect(result.added.map((a) => a.record)).toEqual([
      { name: "alice", alias: "https://github.com/alice", email: "a@x.org" },
    ]);
    expect(result.warnings).toEqual([
      { subject: "alice", reason: "only one name part found, added as an entity" },
      { subject: "alice", reason: "no ORCID found" },
    ]);
    expect(decideValidity(result, true)).toEqual({ passed: true, blockingContributors: [] });
  });

  it("ignores blacklisted bots entirely", async () => {
    const events: ContributionEvent[] = [
      { kind: "pr-comment", identity: { username: "bot1" }, sourceRef: "9", timestamp: at(0) },
    ];
    const result = await reconcile({
      events,
      cff: loadCff(EMPTY_CFF),
      policy: policy({ botBlacklist: parseBotBlacklist("bot1") }),
    });

    expect(result.contributors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(decideValidity(result, true).passed).toBe(true);
  });

  it("ignores a blacklisted bot that only appears as a co-author trailer", async () => {
    const events: ContributionEvent[] = [
      {
        kind: "commit-co-author",
        identity: { email: "49699333+dependabot[bot]@users.noreply.github.com" },
        sourceRef: "abc1234",
        timestamp: at(0),
      },
    ];
    const result = await reconcile({
      events,
      cff: loadCff(EMPTY_CFF),
      policy: policy({ botBlacklist: parseBotBlacklist("dependabot[bot]") }),
    });

    expect(result.contributors).toEqual([]);
    expect(result.added).toEqual([]);
  });

  it("adds a name-only commenter and warns about missing contact details", async () => {
    const events: ContributionEvent[] = [
      { kind: "issue-comment", identity: { displayName: "J. Smith" }, sourceRef: "77", timestamp: at(0) },
    ];
    const result = await reconcile({
      events,
      cff: loadCff(EMPTY_CFF),
      policy: policy({ minimumMetadata: "name" }),
    });

    expect(result.added).toHaveLength(1);
    expect(result.added[0].record).toEqual({ "given-names": "J.", "family-names": "Smith" });
    expect(result.warnings).toEqual([{ subject: "name:j. smith", reason: "no email or ORCID found" }]);
  });

  it("blocks on contributors that cannot be added, unless the flag is off", async () => {
    const events: ContributionEvent[] = [
      { kind: "commit", identity: {}, sourceRef: "deadbee", timestamp: at(0) },
    ];
    const result = await reconcile({ events, cff: loadCff(EMPTY_CFF), policy: policy() });

    expect(result.unmatched.map((u) => u.contributor.key)).toEqual(["unidentified:commit:deadbee"]);
    expect(result.warnings).toEqual([
      {
        subject: "unidentified:commit:deadbee",
        reason: "not added: no usable identity signal (name, email or ORCID)",
      },
    ]);
    expect(decideValidity(result, true)).toEqual({
      passed: false,
      blockingContributors: ["unidentified:commit:deadbee"],
    });
    expect(decideValidity(result, false).passed).toBe(true);
  });

  it("is idempotent over its own output", async () => {
    const events: ContributionEvent[] = [
      { kind: "commit", identity: { username: "alice", email: "a@x.org" }, sourceRef: "c1", timestamp: at(0) },
      { kind: "issue-comment", identity: { displayName: "J. Smith" }, sourceRef: "77", timestamp: at(1) },
      { kind: "review", identity: { username: "bob", displayName: "Bob Stone" }, sourceRef: "5", timestamp: at(2) },
    ];
    const first = await reconcile({ events, cff: loadCff(EMPTY_CFF), policy: policy() });
    const text = serializeCff(first.cff);

    const second = await reconcile({ events, cff: loadCff(text), policy: policy() });

    expect(first.added).toHaveLength(3);
    expect(second.added).toEqual([]);
    expect(second.matched).toHaveLength(3);
    expect(serializeCff(second.cff)).toBe(text);
  });

  it("appends records in first-seen order whatever the event order", async () => {
    const events: ContributionEvent[] = [
      { kind: "review", identity: { username: "zed", displayName: "Zed Zulu" }, sourceRef: "1", timestamp: at(5) },
      { kind: "commit", identity: { username: "amy", displayName: "Amy Alpha" }, sourceRef: "2", timestamp: at(1) },
      { kind: "commit", identity: { username: "kim", displayName: "Kim Kilo" }, sourceRef: "3", timestamp: at(1) },
    ];
    const forward = await reconcile({ events, cff: loadCff(EMPTY_CFF), policy: policy() });
    const backward = await reconcile({
      events: [...events].reverse(),
      cff: loadCff(EMPTY_CFF),
      policy: policy(),
    });

    expect(forward.added.map((a) => a.contributor.key)).toEqual(["amy", "kim", "zed"]);
    expect(serializeCff(backward.cff)).toBe(serializeCff(forward.cff));
  });

  it("treats a disabled category as if its events were absent", async () => {
    const events: ContributionEvent[] = [
      { kind: "review", identity: { username: "rev" }, sourceRef: "1", timestamp: at(0) },
      { kind: "commit", identity: { username: "dev", displayName: "Dev Eloper" }, sourceRef: "2", timestamp: at(1) },
      { kind: "review", identity: { username: "dev" }, sourceRef: "3", timestamp: at(2) },
      { kind: "pr-comment", identity: { username: "rev" }, sourceRef: "4", timestamp: at(3) },
    ];
    const disabled = await reconcile({
      events,
      cff: loadCff(EMPTY_CFF),
      policy: policy({ categories: { ...policy().categories, reviews: false } }),
    });
    const absent = await reconcile({
      events: events.filter((e) => e.kind !== "review"),
      cff: loadCff(EMPTY_CFF),
      policy: policy(),
    });

    expect(disabled.contributors.map((c) => c.key)).toEqual(["dev", "rev"]);
    expect({ ...disabled, cff: serializeCff(disabled.cff) }).toEqual({
      ...absent,
      cff: serializeCff(absent.cff),
    });
    expect(buildReport(disabled, decideValidity(disabled, true))).toEqual(
      buildReport(absent, decideValidity(absent, true)),
    );
  });

  it("does not add a second record for a contributor already added in the same run", async () => {
    const events: ContributionEvent[] = [
      { kind: "issue-comment", identity: { displayName: "Sam Lee" }, sourceRef: "1", timestamp: at(0) },
      { kind: "commit", identity: { username: "samlee", displayName: "Sam Lee" }, sourceRef: "2", timestamp: at(1) },
    ];
    const result = await reconcile({ events, cff: loadCff(EMPTY_CFF), policy: policy() });

    expect(result.added.map((a) => a.contributor.key)).toEqual(["name:sam lee"]);
    expect(result.matched.map((m) => [m.contributor.key, m.tier])).toEqual([["samlee", "name"]]);
  });

  it("warns about invalid ORCIDs in the events", async () => {
    const events: ContributionEvent[] = [
      { kind: "commit", identity: { username: "zoe", orcid: "0000-0002-1234-5678" }, sourceRef: "1", timestamp: at(0) },
    ];
    const result = await reconcile({ events, cff: loadCff(EMPTY_CFF), policy: policy() });

    expect(result.warnings[0]).toEqual({
      subject: "zoe",
      reason: "ORCID `0000-0002-1234-5678` is invalid and was ignored",
    });
    expect(result.added[0].record.orcid).toBeUndefined();
  });

  describe("with ORCID lookups", () => {
    const cffText = `cff-version: 1.2.0
authors:
  - given-names: Ada
    family-names: Lovelace
    email: ada@example.org
  - given-names: Grace B.
    family-names: Hopper
    orcid: https://orcid.org/0000-0001-9876-5439
`;

    function client(ids: Record<string, string[]>): OrcidClient {
      return { search: vi.fn(async (query: OrcidQuery) => ids[query.email ?? ""] ?? []) };
    }

    it("looks up only contributors no existing author matches", async () => {
      const orcid = client({ "eve@example.org": ["0000-0004-5555-6663"] });
      const events: ContributionEvent[] = [
        { kind: "commit", identity: { username: "ada", email: "ada@example.org" }, sourceRef: "1", timestamp: at(0) },
        { kind: "commit", identity: { username: "eve", displayName: "Eve Adams", email: "eve@example.org" }, sourceRef: "2", timestamp: at(1) },
      ];
      const result = await reconcile({
        events,
        cff: loadCff(cffText),
        policy: policy(),
        orcid,
        lookup,
      });

      expect(orcid.search).toHaveBeenCalledTimes(1);
      expect(result.added[0].record).toEqual({
        "given-names": "Eve",
        "family-names": "Adams",
        alias: "https://github.com/eve",
        email: "eve@example.org",
        orcid: "https://orcid.org/0000-0004-5555-6663",
      });
      expect(result.orcidLogs).toEqual([
        {
          contributor: "eve",
          query: 'email:"eve@example.org"',
          outcome: "success",
          orcid: "0000-0004-5555-6663",
        },
      ]);
    });

    it("matches an existing author through a looked-up ORCID", async () => {
      const orcid = client({ "grace@navy.example": ["0000-0001-9876-5439"] });
      const events: ContributionEvent[] = [
        { kind: "commit", identity: { username: "ghopper", email: "grace@navy.example" }, sourceRef: "1", timestamp: at(0) },
      ];
      const result = await reconcile({
        events,
        cff: loadCff(cffText),
        policy: policy(),
        orcid,
        lookup,
      });

      expect(result.added).toEqual([]);
      expect(result.matched.map((m) => [m.authorIndex, m.tier])).toEqual([[1, "identifier"]]);
    });

    it("skips lookups when disabled", async () => {
      const orcid = client({});
      const events: ContributionEvent[] = [
        { kind: "commit", identity: { username: "eve", email: "eve@example.org" }, sourceRef: "2", timestamp: at(1) },
      ];
      await reconcile({
        events,
        cff: loadCff(cffText),
        policy: policy({ orcidLookup: false }),
        orcid,
        lookup,
      });
      expect(orcid.search).not.toHaveBeenCalled();
    });

    it("turns failed lookups into warnings", async () => {
      const orcid: OrcidClient = {
        search: vi.fn(async (): Promise<string[]> => {
          throw new Error("ORCID search failed (500)");
        }),
      };
      const events: ContributionEvent[] = [
        { kind: "commit", identity: { username: "eve", email: "eve@example.org" }, sourceRef: "2", timestamp: at(1) },
      ];
      const result = await reconcile({
        events,
        cff: loadCff(cffText),
        policy: policy(),
        orcid,
        lookup,
      });

      expect(result.warnings).toEqual([
        { subject: "eve", reason: "ORCID lookup failed: ORCID search failed (500)" },
        { subject: "eve", reason: "only one name part found, added as an entity" },
        { subject: "eve", reason: "no ORCID found" },
      ]);
    });

    it("keeps a failed lookup as a warning when a later query matches", async () => {
      const orcid: OrcidClient = {
        search: vi.fn(async (query: OrcidQuery): Promise<string[]> => {
          if (query.email) throw new Error("ORCID search failed (503)");
          return query.familyNames === "Hopper" ? ["0000-0001-9876-5439"] : [];
        }),
      };
      const events: ContributionEvent[] = [
        {
          kind: "commit",
          identity: { username: "grace", displayName: "Grace Hopper", email: "grace@navy.example" },
          sourceRef: "1",
          timestamp: at(0),
        },
      ];
      const result = await reconcile({
        events,
        cff: loadCff(cffText),
        policy: policy(),
        orcid,
        lookup,
      });

      expect(result.orcidLogs.map((log) => log.outcome)).toEqual(["error", "success"]);
      expect(result.matched.map((m) => [m.authorIndex, m.tier])).toEqual([[1, "identifier"]]);
      expect(result.warnings).toEqual([
        { subject: "grace", reason: "ORCID lookup failed: ORCID search failed (503)" },
      ]);
    });
  });
});
