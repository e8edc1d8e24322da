import { stageStart, type ProviderStage } from "./sofascore-client";

export interface RaceWeekend {
  stage: ProviderStage;
  sessions: ProviderStage[];
}

export type WeekendFraming = "current" | "next";

export interface FramedWeekend {
  framing: WeekendFraming;
  weekend: RaceWeekend;
}

// Sessions the provider lists without an end are assumed to run this long.
export const ASSUMED_SESSION_SECONDS = 2 * 60 * 60;

interface Span {
  start: number;
  end: number;
}

/** First session start to last session end, in unix seconds. */
export function weekendSpan(weekend: RaceWeekend): Span | null {
  const sources = weekend.sessions.length > 0 ? weekend.sessions : [weekend.stage];
  let start = Number.POSITIVE_INFINITY;
  let end = Number.NEGATIVE_INFINITY;
  for (const session of sources) {
    const sessionStart = stageStart(session);
    if (sessionStart === null) continue;
    start = Math.min(start, sessionStart);
    end = Math.max(end, session.endDateTimestamp ?? sessionStart + ASSUMED_SESSION_SECONDS);
  }
  if (!Number.isFinite(start)) return null;
  return { start, end };
}

/**
 * Chooses the weekend to show for a motorsport series.
 *
 * A weekend is current when one of its sessions has started and another has
 * not yet ended, or when the provider already marks it in progress. Otherwise
 * the weekend whose first session is the nearest in the future is next.
 */
export function frameWeekend(weekends: RaceWeekend[], nowSeconds: number): FramedWeekend | null {
  const spans = weekends
    .map((weekend) => ({ weekend, span: weekendSpan(weekend) }))
    .filter((entry): entry is { weekend: RaceWeekend; span: Span } => entry.span !== null)
    .sort((a, b) => a.span.start - b.span.start || compareText(stageName(a.weekend.stage), stageName(b.weekend.stage)));

  const current = spans.find(
    ({ weekend, span }) =>
      (span.start <= nowSeconds && nowSeconds < span.end) || weekend.stage.status?.type === "inprogress"
  );
  if (current) {
    return { framing: "current", weekend: current.weekend };
  }

  const next = spans.find(({ span }) => span.start > nowSeconds);
  return next ? { framing: "next", weekend: next.weekend } : null;
}

export function stageName(stage: ProviderStage): string {
  return stage.name || stage.description || `Stage ${stage.id}`;
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
