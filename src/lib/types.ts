import type { Language } from "./i18n";
import type { TopicKey } from "./topics";

export interface TableData {
  header: string[];
  rows: string[][];
}

export interface TopicTable {
  title: string;
  table: TableData;
}

export interface NewsCandidate {
  title: string;
  link: string;
  summary: string;
  publishedAt: string | null;
  source: string;
}

export interface NewsItem {
  title: string;
  link: string;
  recap: string;
}

export interface GatheredSection {
  topic: TopicKey;
  title: string;
  table: TableData;
  candidates: NewsCandidate[];
}

export interface GatheredPayload {
  pageTitle: string;
  intro: string;
  date: string;
  timezone: string;
  generatedAt: string;
  sections: GatheredSection[];
}

export interface FinalizedSection {
  topic: TopicKey;
  title: string;
  table: TableData;
  news: NewsItem[];
}

export interface FinalizedPayload {
  pageTitle: string;
  intro: string;
  date?: string;
  sections: FinalizedSection[];
}

export interface FeedTopicBinding {
  news_key: string;
  keywords?: string[];
}

export interface FeedDefinition {
  title: string;
  url: string;
  kind: "rss" | "html";
  link_prefix?: string;
  path_includes?: string;
  topics: FeedTopicBinding[];
}

export interface BriefingConfig {
  timezone: string;
  language: Language;
  provider: {
    base_url: string;
    sessions_base_url: string;
    timeout_ms: number;
  };
  events: {
    match_limit: number;
    session_limit: number;
    stage_lookback_days: number;
    max_stage_candidates: number;
  };
  news: {
    timeout_ms: number;
    max_entries_per_feed: number;
    max_candidates: number;
  };
  notion: {
    database_id: string;
    title_property: string;
    category_property: string;
    category: string;
    token_path: string;
    version: string;
    timeout_ms: number;
  };
  output: {
    gathered_payload: string;
    finalized_payload: string;
    markdown: string;
  };
  feeds: FeedDefinition[];
}
