import { afterEach, describe, expect, it, vi } from "vitest";
import { SofascoreProvider, stageStart } from "@/events/sofascore-client";
import { ParseError } from "@/lib/errors";

const provider = new SofascoreProvider({
  base_url: "https://api.provider.example.com/api/v1",
  sessions_base_url: "https://www.provider.example.com/api/v1",
  timeout_ms: 1000
});

function stubJson(body: unknown) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status: 200 })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("SofascoreProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reads a team's next events", async () => {
    const fetchMock = stubJson({
      events: [{ id: 7, startTimestamp: 1_792_521_900, homeTeam: { name: "Fiorentina" }, awayTeam: { name: "Lazio" } }]
    });

    const events = await provider.nextTeamEvents(2693);

    expect(fetchMock.mock.calls[0][0]).toBe("https://api.provider.example.com/api/v1/team/2693/events/next/0");
    expect(events).toEqual([
      { id: 7, startTimestamp: 1_792_521_900, homeTeam: { name: "Fiorentina" }, awayTeam: { name: "Lazio" } }
    ]);
  });

  it("treats a missing events list as empty", async () => {
    stubJson({});

    await expect(provider.lastTeamEvents(2693)).resolves.toEqual([]);
  });

  it("keeps only stage results from a search", async () => {
    const fetchMock = stubJson({
      results: [
        { type: "team", entity: { id: 1, name: "Ferrari" } },
        { type: "stage", entity: { id: 501, name: "Grand Prix of Australia", startDateTimestamp: 1_792_738_800 } },
        { type: "stage", entity: { name: "no id" } }
      ]
    });

    const stages = await provider.searchStages("formula 1");

    expect(fetchMock.mock.calls[0][0]).toBe("https://api.provider.example.com/api/v1/search/all?q=formula%201");
    expect(stages).toEqual([{ id: 501, name: "Grand Prix of Australia", startDateTimestamp: 1_792_738_800 }]);
  });

  it("loads sessions from the sessions host", async () => {
    const fetchMock = stubJson({ stages: [{ id: 5011, name: "Free Practice 1" }] });

    const sessions = await provider.stageSessions(501);

    expect(fetchMock.mock.calls[0][0]).toBe("https://www.provider.example.com/api/v1/stage/501/substages");
    expect(sessions).toEqual([{ id: 5011, name: "Free Practice 1" }]);
  });

  it("rejects responses of the wrong shape", async () => {
    stubJson({ events: [{ id: "seven" }] });

    await expect(provider.nextTeamEvents(2693)).rejects.toBeInstanceOf(ParseError);
  });
});

describe("stageStart", () => {
  it("prefers the date timestamp over the start timestamp", () => {
    expect(stageStart({ id: 1, startDateTimestamp: 200, startTimestamp: 100 })).toBe(200);
    expect(stageStart({ id: 1, startTimestamp: 100 })).toBe(100);
    expect(stageStart({ id: 1 })).toBeNull();
  });
});
