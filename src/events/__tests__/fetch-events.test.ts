import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { fetchAllEvents, fetchEvents, type EventContext } from "@/events/fetch-events";
import type { EventProvider, ProviderEvent, ProviderStage } from "@/events/sofascore-client";
import { frameWeekend } from "@/events/weekend";
import { TOPICS, type TopicKey } from "@/lib/topics";

const ts = (iso: string) => Date.parse(iso) / 1000;

function topic(key: TopicKey) {
  const found = TOPICS.find((candidate) => candidate.key === key);
  if (!found) throw new Error(`unknown topic ${key}`);
  return found;
}

function match(
  id: number,
  home: string,
  away: string,
  start: string,
  extra: Partial<ProviderEvent> = {}
): ProviderEvent {
  return {
    id,
    startTimestamp: ts(start),
    homeTeam: { name: home },
    awayTeam: { name: away },
    status: { type: "notstarted" },
    ...extra
  };
}

class FakeProvider implements EventProvider {
  next = new Map<number, ProviderEvent[]>();
  last = new Map<number, ProviderEvent[]>();
  stages: ProviderStage[] = [];
  sessions = new Map<number, ProviderStage[]>();
  failing = false;

  async nextTeamEvents(teamId: number) {
    if (this.failing) throw new Error("HTTP 503");
    return this.next.get(teamId) ?? [];
  }

  async lastTeamEvents(teamId: number) {
    if (this.failing) throw new Error("HTTP 503");
    return this.last.get(teamId) ?? [];
  }

  async searchStages() {
    if (this.failing) throw new Error("HTTP 503");
    return this.stages;
  }

  async stageSessions(stageId: number) {
    return this.sessions.get(stageId) ?? [];
  }
}

function context(provider: EventProvider, now: string): EventContext {
  return {
    provider,
    now: new Date(now),
    timezone: "Europe/Rome",
    limits: { match_limit: 2, session_limit: 30, stage_lookback_days: 7, max_stage_candidates: 10 }
  };
}

const australia: ProviderStage = {
  id: 501,
  name: "Grand Prix of Australia",
  category: { name: "MotoGP" },
  startDateTimestamp: ts("2026-10-23T09:00:00Z"),
  endDateTimestamp: ts("2026-10-25T13:45:00Z")
};

const australiaSessions: ProviderStage[] = [
  {
    id: 5013,
    name: "Race",
    type: { name: "Race" },
    startDateTimestamp: ts("2026-10-25T13:00:00Z"),
    endDateTimestamp: ts("2026-10-25T13:45:00Z")
  },
  {
    id: 5011,
    name: "Free Practice 1",
    type: { name: "Practice" },
    startDateTimestamp: ts("2026-10-23T09:00:00Z"),
    endDateTimestamp: ts("2026-10-23T09:45:00Z")
  },
  {
    id: 5012,
    name: "Qualifying",
    type: { name: "Qualifying" },
    startDateTimestamp: ts("2026-10-24T08:00:00Z"),
    endDateTimestamp: ts("2026-10-24T08:40:00Z")
  }
];

describe("fetchEvents", () => {
  let provider: FakeProvider;

  beforeEach(() => {
    provider = new FakeProvider();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists the next two upcoming club fixtures", async () => {
    provider.next.set(2693, [
      match(3, "Fiorentina", "Napoli", "2026-10-26T19:45:00Z", {
        tournament: { uniqueTournament: { name: "Serie A" } },
        roundInfo: { round: 9 }
      }),
      match(2, "Roma", "Fiorentina", "2026-10-23T17:00:00Z", {
        tournament: { uniqueTournament: { name: "Conference League" } },
        roundInfo: { name: "League phase" }
      }),
      match(1, "Fiorentina", "Lazio", "2026-10-20T18:45:00Z", {
        tournament: { uniqueTournament: { name: "Serie A" } },
        roundInfo: { round: 8 }
      }),
      match(0, "Fiorentina", "Genoa", "2026-10-21T18:45:00Z", { status: { type: "canceled" } })
    ]);

    const result = await fetchEvents(topic("fiorentina"), context(provider, "2026-10-19T06:00:00Z"));

    expect(result).toEqual({
      title: "Fiorentina",
      table: {
        header: ["Match", "When", "Competition", "Round"],
        rows: [
          ["Fiorentina - Lazio", "Tomorrow at 20:45 (Tue 20.Oct)", "Serie A", "8"],
          ["Roma - Fiorentina", "Next Friday at 19:00 (Fri 23.Oct)", "Conference League", "League phase"]
        ]
      }
    });
  });

  it("breaks equal start times by match label", async () => {
    provider.next.set(2692, [
      match(1, "Milan", "Como", "2026-10-21T18:45:00Z"),
      match(2, "Inter", "Genoa", "2026-10-21T18:45:00Z")
    ]);

    const result = await fetchEvents(topic("milan"), context(provider, "2026-10-19T06:00:00Z"));

    expect(result.table.rows.map((row) => row[0])).toEqual(["Inter - Genoa", "Milan - Como"]);
  });

  it("falls back to recent events for a player without upcoming ones", async () => {
    provider.last.set(206570, [
      match(1, "Sinner J.", "Alcaraz C.", "2026-10-12T14:00:00Z", { status: { type: "finished" } }),
      match(2, "Sinner J.", "Zverev A.", "2026-10-22T14:00:00Z", {
        tournament: { name: "Vienna" },
        roundInfo: { name: "Round of 16" }
      })
    ]);

    const result = await fetchEvents(topic("sinner"), context(provider, "2026-10-19T06:00:00Z"));

    expect(result.table).toEqual({
      header: ["Match", "When", "Tournament", "Round"],
      rows: [["Sinner J. - Zverev A.", "Next Thursday at 16:00 (Thu 22.Oct)", "Vienna", "Round of 16"]]
    });
  });

  it("keeps only major international volleyball competitions", async () => {
    const international = { name: "International" };
    provider.next.set(6824, [
      match(1, "Italy", "Poland", "2026-10-22T17:00:00Z", {
        tournament: { uniqueTournament: { name: "Friendly Matches", category: international } }
      }),
      match(2, "Italy", "Brazil", "2026-10-24T17:00:00Z", {
        tournament: { uniqueTournament: { name: "Volleyball Nations League", category: international } }
      })
    ]);

    const result = await fetchEvents(topic("volley_m"), context(provider, "2026-10-19T06:00:00Z"));

    expect(result.table.rows.map((row) => row[0])).toEqual(["Italy - Brazil"]);
  });

  it("degrades to a header-only table when the provider fails", async () => {
    provider.failing = true;

    const result = await fetchEvents(topic("fiorentina"), context(provider, "2026-10-19T06:00:00Z"));

    expect(result).toEqual({
      title: "Fiorentina",
      table: { header: ["Match", "When", "Competition", "Round"], rows: [] }
    });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("frames a weekend in progress as current", async () => {
    provider.stages = [australia, { id: 900, name: "Moto2 Australia", category: { name: "Moto2" }, startDateTimestamp: ts("2026-10-23T08:00:00Z") }];
    provider.sessions.set(501, australiaSessions);

    const result = await fetchEvents(topic("motogp"), context(provider, "2026-10-24T10:00:00Z"));

    expect(result).toEqual({
      title: "MotoGP (current weekend: Grand Prix of Australia)",
      table: {
        header: ["Session", "Type", "When"],
        rows: [
          ["Free Practice 1", "Practice", "Yesterday at 11:00 (Fri 23.Oct)"],
          ["Qualifying", "Qualifying", "Today at 10:00 (Sat 24.Oct)"],
          ["Race", "Race", "Tomorrow at 14:00 (Sun 25.Oct)"]
        ]
      }
    });
  });

  it("frames the nearest future weekend as next", async () => {
    const finished: ProviderStage = {
      id: 499,
      name: "Grand Prix of Japan",
      category: { name: "MotoGP" },
      startDateTimestamp: ts("2026-10-16T02:00:00Z")
    };
    const tooOld: ProviderStage = {
      id: 498,
      name: "Grand Prix of Indonesia",
      category: { name: "MotoGP" },
      startDateTimestamp: ts("2026-10-09T02:00:00Z")
    };
    provider.stages = [australia, finished, tooOld];
    provider.sessions.set(501, australiaSessions);
    provider.sessions.set(499, [
      {
        id: 4991,
        name: "Race",
        startDateTimestamp: ts("2026-10-18T05:00:00Z"),
        endDateTimestamp: ts("2026-10-18T05:45:00Z")
      }
    ]);

    const result = await fetchEvents(topic("motogp"), context(provider, "2026-10-19T06:00:00Z"));

    expect(result.title).toBe("MotoGP (next weekend: Grand Prix of Australia)");
    expect(result.table.rows).toEqual([
      ["Free Practice 1", "Practice", "Next Friday at 11:00 (Fri 23.Oct)"],
      ["Qualifying", "Qualifying", "Next Saturday at 10:00 (Sat 24.Oct)"],
      ["Race", "Race", "Next Sunday at 14:00 (Sun 25.Oct)"]
    ]);
  });

  it("leaves the table empty when no weekend is ahead", async () => {
    const result = await fetchEvents(topic("f1"), context(provider, "2026-10-19T06:00:00Z"));

    expect(result).toEqual({ title: "Formula 1", table: { header: ["Session", "Type", "When"], rows: [] } });
  });
});

describe("fetchAllEvents", () => {
  it("returns a table for every topic even when all sources fail", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const provider = new FakeProvider();
    provider.failing = true;

    const tables = await fetchAllEvents(TOPICS, context(provider, "2026-10-19T06:00:00Z"), 3);

    expect(Object.keys(tables).sort()).toEqual([...TOPICS.map((entry) => entry.key)].sort());
    expect(Object.values(tables).every((table) => table?.table.rows.length === 0)).toBe(true);
    vi.restoreAllMocks();
  });
});

describe("frameWeekend", () => {
  it("treats a stage marked in progress as current", () => {
    const stage: ProviderStage = {
      id: 1,
      name: "Grand Prix of Brazil",
      startDateTimestamp: ts("2026-10-30T12:00:00Z"),
      status: { type: "inprogress" }
    };

    const framed = frameWeekend([{ stage, sessions: [] }], ts("2026-10-19T06:00:00Z"));

    expect(framed?.framing).toBe("current");
  });

  it("returns null when every weekend is over", () => {
    const stage: ProviderStage = { id: 1, name: "Old", startDateTimestamp: ts("2026-10-01T12:00:00Z") };

    expect(frameWeekend([{ stage, sessions: [] }], ts("2026-10-19T06:00:00Z"))).toBeNull();
  });

  it("keeps a weekend current while its last session runs without an end time", () => {
    const sessions = australiaSessions.map((session) =>
      session.id === 5013 ? { ...session, endDateTimestamp: null } : session
    );
    const japan: ProviderStage = {
      id: 502,
      name: "Grand Prix of Japan",
      startDateTimestamp: ts("2026-10-30T02:00:00Z"),
      endDateTimestamp: ts("2026-11-01T06:45:00Z")
    };

    const framed = frameWeekend(
      [
        { stage: australia, sessions },
        { stage: japan, sessions: [] }
      ],
      ts("2026-10-25T13:30:00Z")
    );

    expect(framed?.framing).toBe("current");
    expect(framed?.weekend.stage.id).toBe(501);
  });
});
