import { MAX_NEWS_PER_SECTION } from "@/lib/constants";
import type { FinalizedPayload, GatheredPayload, NewsItem } from "@/lib/types";

/**
 * The seam between gathering and publishing. Whatever picks and summarises
 * the news (a model, a person, the headline selector below) turns a gathered
 * payload into a finalized one with at most four items per section.
 */
export interface NewsSelector {
  select(payload: GatheredPayload): Promise<FinalizedPayload>;
}

/** Deterministic stand-in: newest candidates first, the feed's own summary as recap. */
export class HeadlineSelector implements NewsSelector {
  private readonly perSection: number;

  constructor(perSection = MAX_NEWS_PER_SECTION) {
    this.perSection = Math.min(Math.max(0, perSection), MAX_NEWS_PER_SECTION);
  }

  async select(payload: GatheredPayload): Promise<FinalizedPayload> {
    return {
      pageTitle: payload.pageTitle,
      intro: payload.intro,
      date: payload.date,
      sections: payload.sections.map((section) => ({
        topic: section.topic,
        title: section.title,
        table: section.table,
        news: section.candidates.slice(0, this.perSection).map(
          (candidate): NewsItem => ({
            title: candidate.title,
            link: candidate.link,
            recap: candidate.summary.trim() || candidate.title
          })
        )
      }))
    };
  }
}
