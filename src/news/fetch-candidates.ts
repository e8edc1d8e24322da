import { describeError } from "@/lib/errors";
import { logWarn } from "@/lib/log";
import { runPool } from "@/lib/pool";
import type { TopicDefinition, TopicKey } from "@/lib/topics";
import type { FeedDefinition, NewsCandidate } from "@/lib/types";
import type { FeedEntry, FeedReader } from "./feed-reader";

export interface CandidateOptions {
  maxCandidates: number;
  concurrency: number;
}

interface FeedResult {
  feed: FeedDefinition;
  entries: FeedEntry[];
}

/**
 * Reads every feed bound to at least one of `topics` once, then distributes
 * the entries. A feed that fails contributes nothing; the others are unaffected.
 */
export async function gatherCandidates(
  topics: readonly TopicDefinition[],
  feeds: readonly FeedDefinition[],
  reader: FeedReader,
  options: CandidateOptions
): Promise<Partial<Record<TopicKey, NewsCandidate[]>>> {
  const newsKeys = new Set(topics.map((topic) => topic.newsKey));
  const relevantFeeds = feeds.filter((feed) => feed.topics.some((binding) => newsKeys.has(binding.news_key)));

  // Results are stored by index so downstream ordering follows feeds.yml, not completion timing.
  const results: FeedResult[] = new Array(relevantFeeds.length);
  await runPool(relevantFeeds, options.concurrency, async (feed, index) => {
    let entries: FeedEntry[] = [];
    try {
      entries = await reader.read(feed);
    } catch (error) {
      logWarn(`Feed unavailable: "${feed.title}" (${describeError(error)})`);
    }
    results[index] = { feed, entries };
  });

  const candidates: Partial<Record<TopicKey, NewsCandidate[]>> = {};
  for (const topic of topics) {
    candidates[topic.key] = collectCandidates(topic, results, options.maxCandidates);
  }
  return candidates;
}

export async function fetchCandidates(
  topic: TopicDefinition,
  feeds: readonly FeedDefinition[],
  reader: FeedReader,
  options: CandidateOptions
): Promise<NewsCandidate[]> {
  const gathered = await gatherCandidates([topic], feeds, reader, options);
  return gathered[topic.key] ?? [];
}

export function matchesKeywords(entry: FeedEntry, keywords: string[] | undefined): boolean {
  if (!keywords || keywords.length === 0) {
    return true;
  }
  const haystack = [entry.title, entry.summary, ...entry.categories].join(" ").toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

function collectCandidates(topic: TopicDefinition, results: FeedResult[], maxCandidates: number): NewsCandidate[] {
  const seen = new Set<string>();
  const collected: NewsCandidate[] = [];
  for (const { feed, entries } of results) {
    for (const binding of feed.topics) {
      if (binding.news_key !== topic.newsKey) continue;
      for (const entry of entries) {
        if (seen.has(entry.link) || !matchesKeywords(entry, binding.keywords)) continue;
        seen.add(entry.link);
        collected.push({
          title: entry.title,
          link: entry.link,
          summary: entry.summary,
          publishedAt: entry.publishedAt,
          source: feed.title
        });
      }
    }
  }
  return collected
    .sort(byNewestFirst)
    .slice(0, topic.candidateLimit ?? maxCandidates);
}

// Undated entries sink to the end; Array#sort is stable so their source order is kept.
function byNewestFirst(a: NewsCandidate, b: NewsCandidate): number {
  const aTime = a.publishedAt ? Date.parse(a.publishedAt) : Number.NEGATIVE_INFINITY;
  const bTime = b.publishedAt ? Date.parse(b.publishedAt) : Number.NEGATIVE_INFINITY;
  if (aTime === bTime) return 0;
  return aTime > bTime ? -1 : 1;
}
