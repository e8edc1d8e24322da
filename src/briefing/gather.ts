import { fetchAllEvents } from "@/events/fetch-events";
import type { EventProvider } from "@/events/sofascore-client";
import { gatherCandidates } from "@/news/fetch-candidates";
import type { FeedReader } from "@/news/feed-reader";
import { TOPICS } from "@/lib/topics";
import type { BriefingConfig, GatheredPayload } from "@/lib/types";
import { assemblePayload } from "./assemble";

export interface GatherContext {
  config: BriefingConfig;
  provider: EventProvider;
  reader: FeedReader;
  now: Date;
  eventConcurrency: number;
  feedConcurrency: number;
}

/** Events and news share no state, so both branches run at once and are folded after both settle. */
export async function gatherBriefing(context: GatherContext): Promise<GatheredPayload> {
  const { config, now } = context;
  const [tables, candidates] = await Promise.all([
    fetchAllEvents(
      TOPICS,
      { provider: context.provider, now, timezone: config.timezone, limits: config.events },
      context.eventConcurrency
    ),
    gatherCandidates(TOPICS, config.feeds, context.reader, {
      maxCandidates: config.news.max_candidates,
      concurrency: context.feedConcurrency
    })
  ]);
  return assemblePayload(tables, candidates, now, config);
}
