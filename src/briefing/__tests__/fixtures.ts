import { TOPICS, emptyTable } from "@/lib/topics";
import type { FinalizedPayload, FinalizedSection } from "@/lib/types";

export function finalizedPayload(overrides: Partial<Record<string, Partial<FinalizedSection>>> = {}): FinalizedPayload {
  return {
    pageTitle: "Riepilogo Sportivo Giornaliero del 2026-10-19",
    intro: "Riepilogo automatico (eventi + notizie selezionate).",
    date: "2026-10-19",
    sections: TOPICS.map((topic) => ({
      topic: topic.key,
      title: topic.title,
      table: emptyTable(topic),
      news: [],
      ...overrides[topic.key]
    }))
  };
}
