import { buildPageTitle, t } from "@/lib/i18n";
import { writePayloadFile } from "@/lib/load-payload";
import { isoDateInZone } from "@/lib/time-zone";
import { TOPICS, emptyTable, type TopicKey } from "@/lib/topics";
import type { BriefingConfig, GatheredPayload, NewsCandidate, TopicTable } from "@/lib/types";

/**
 * Pairs each topic's table with its news candidates, in topic order. Topics
 * absent from either map get a header-only table or an empty candidate list.
 */
export function assemblePayload(
  tables: Partial<Record<TopicKey, TopicTable>>,
  candidates: Partial<Record<TopicKey, NewsCandidate[]>>,
  now: Date,
  config: Pick<BriefingConfig, "timezone" | "language">
): GatheredPayload {
  const date = isoDateInZone(now, config.timezone);
  return {
    pageTitle: buildPageTitle(date, config.language),
    intro: t(config.language, "intro"),
    date,
    timezone: config.timezone,
    generatedAt: now.toISOString(),
    sections: TOPICS.map((topic) => {
      const table = tables[topic.key];
      return {
        topic: topic.key,
        title: table?.title ?? topic.title,
        table: table?.table ?? emptyTable(topic),
        candidates: candidates[topic.key] ?? []
      };
    })
  };
}

/** Writes the gathered payload where the selection step expects to find it. */
export async function persistPayload(target: string, payload: GatheredPayload): Promise<void> {
  await writePayloadFile(target, payload);
}
