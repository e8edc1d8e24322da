import { describeError } from "@/lib/errors";
import { humanizeWhen } from "@/lib/humanize";
import { logWarn } from "@/lib/log";
import { runPool } from "@/lib/pool";
import { fromUnixSeconds, toUnixSeconds } from "@/lib/time-zone";
import { emptyTable, type TopicDefinition, type TopicKey } from "@/lib/topics";
import type { BriefingConfig, TableData, TopicTable } from "@/lib/types";
import { stageStart, type EventProvider, type ProviderEvent, type ProviderStage } from "./sofascore-client";
import { compareText, frameWeekend, stageName, type RaceWeekend } from "./weekend";

export interface EventContext {
  provider: EventProvider;
  now: Date;
  timezone: string;
  limits: BriefingConfig["events"];
}

const CLOSED_STATUSES = new Set(["finished", "canceled"]);
const LIVE_OR_PENDING = new Set(["notstarted", "inprogress"]);
const SECONDS_PER_DAY = 86_400;

/**
 * Builds the events table for one topic. Provider failures never escape:
 * the topic degrades to a header-only table so the rest of the run proceeds.
 */
export async function fetchEvents(topic: TopicDefinition, context: EventContext): Promise<TopicTable> {
  try {
    switch (topic.query.kind) {
      case "team":
        return matchTable(topic, await context.provider.nextTeamEvents(topic.query.teamId), context);
      case "player":
        return matchTable(topic, await playerEvents(topic.query.teamId, context), context);
      case "national-team": {
        const competitions = topic.query.competitions;
        const events = await context.provider.nextTeamEvents(topic.query.teamId);
        return matchTable(
          topic,
          events.filter((event) => isMajorCompetition(event, competitions)),
          context
        );
      }
      case "stage-series":
        return await weekendTable(topic, topic.query.searchQuery, topic.query.category, context);
    }
  } catch (error) {
    logWarn(`Events unavailable for ${topic.title}: ${describeError(error)}`);
    return { title: topic.title, table: emptyTable(topic) };
  }
}

export async function fetchAllEvents(
  topics: readonly TopicDefinition[],
  context: EventContext,
  concurrency: number
): Promise<Partial<Record<TopicKey, TopicTable>>> {
  const tables: Partial<Record<TopicKey, TopicTable>> = {};
  await runPool(topics, concurrency, async (topic) => {
    tables[topic.key] = await fetchEvents(topic, context);
  });
  return tables;
}

// Tennis does not always expose upcoming matches under /events/next for a player; /events/last carries them too.
async function playerEvents(teamId: number, context: EventContext): Promise<ProviderEvent[]> {
  let next: ProviderEvent[] = [];
  try {
    next = await context.provider.nextTeamEvents(teamId);
  } catch (error) {
    logWarn(`Next events unavailable for team ${teamId}, trying recent events: ${describeError(error)}`);
  }
  if (next.length > 0) {
    return next;
  }
  const last = await context.provider.lastTeamEvents(teamId);
  return last.filter((event) => LIVE_OR_PENDING.has(event.status?.type ?? ""));
}

export function isMajorCompetition(event: ProviderEvent, competitions: RegExp[]): boolean {
  const tournament = event.tournament;
  const unique = tournament?.uniqueTournament;
  const name = unique?.name || tournament?.name || "";
  const category = tournament?.category?.name || unique?.category?.name || "";
  if (category.toLowerCase() !== "international") {
    return false;
  }
  return competitions.some((pattern) => pattern.test(name));
}

export function isUpcoming(event: ProviderEvent, nowSeconds: number): boolean {
  const status = event.status?.type ?? "";
  if (status === "inprogress") return true;
  if (CLOSED_STATUSES.has(status)) return false;
  return event.startTimestamp >= nowSeconds;
}

function matchLabel(event: ProviderEvent): string {
  return `${event.homeTeam?.name || "?"} - ${event.awayTeam?.name || "?"}`;
}

function matchTable(topic: TopicDefinition, events: ProviderEvent[], context: EventContext): TopicTable {
  const nowSeconds = toUnixSeconds(context.now);
  const rows = events
    .filter((event) => isUpcoming(event, nowSeconds))
    .sort((a, b) => a.startTimestamp - b.startTimestamp || compareText(matchLabel(a), matchLabel(b)))
    .slice(0, context.limits.match_limit)
    .map((event) => {
      const tournament = event.tournament;
      const competition = tournament?.uniqueTournament?.name || tournament?.name || "";
      const round = event.roundInfo?.name || (event.roundInfo?.round != null ? String(event.roundInfo.round) : "");
      return [
        matchLabel(event),
        humanizeWhen(fromUnixSeconds(event.startTimestamp), context.now, context.timezone),
        competition,
        round
      ];
    });
  return { title: topic.title, table: { header: [...topic.columns], rows } };
}

async function weekendTable(
  topic: TopicDefinition,
  searchQuery: string,
  category: string,
  context: EventContext
): Promise<TopicTable> {
  const nowSeconds = toUnixSeconds(context.now);
  const earliest = nowSeconds - context.limits.stage_lookback_days * SECONDS_PER_DAY;
  const found = await context.provider.searchStages(searchQuery);
  const candidates = found
    .filter((stage) => (stage.category?.name ?? "").toLowerCase().includes(category))
    .filter((stage) => {
      const start = stageStart(stage);
      return start !== null && start >= earliest;
    })
    .sort((a, b) => (stageStart(a) ?? 0) - (stageStart(b) ?? 0))
    .slice(0, context.limits.max_stage_candidates);

  const weekends: RaceWeekend[] = await Promise.all(
    candidates.map(async (stage) => {
      try {
        return { stage, sessions: await context.provider.stageSessions(stage.id) };
      } catch (error) {
        logWarn(`Sessions unavailable for ${stageName(stage)}: ${describeError(error)}`);
        return { stage, sessions: [] };
      }
    })
  );

  const framed = frameWeekend(weekends, nowSeconds);
  if (!framed) {
    return { title: topic.title, table: emptyTable(topic) };
  }
  return {
    title: `${topic.title} (${framed.framing} weekend: ${stageName(framed.weekend.stage)})`,
    table: sessionTable(topic, framed.weekend.sessions, context)
  };
}

function sessionTable(topic: TopicDefinition, sessions: ProviderStage[], context: EventContext): TableData {
  const rows = sessions
    .filter((session) => stageStart(session) !== null)
    .sort((a, b) => (stageStart(a) ?? 0) - (stageStart(b) ?? 0) || compareText(stageName(a), stageName(b)))
    .slice(0, context.limits.session_limit)
    .map((session) => [
      session.name || session.description || "Session",
      session.type?.name ?? "",
      humanizeWhen(fromUnixSeconds(stageStart(session) ?? 0), context.now, context.timezone)
    ]);
  return { header: [...topic.columns], rows };
}
