import Parser from "rss-parser";
import { htmlToText } from "html-to-text";
import { z } from "zod";
import { ParseError } from "@/lib/errors";
import { fetchText } from "@/lib/http";
import type { FeedDefinition } from "@/lib/types";

export interface FeedEntry {
  title: string;
  link: string;
  summary: string;
  publishedAt: string | null;
  categories: string[];
}

/** Reads one configured news source. Implementations throw SourceUnavailableError or ParseError. */
export interface FeedReader {
  read(feed: FeedDefinition): Promise<FeedEntry[]>;
}

export interface FeedReaderOptions {
  timeoutMs: number;
  maxEntries: number;
}

const rssParser = new Parser();

export class HttpFeedReader implements FeedReader {
  constructor(private readonly options: FeedReaderOptions) {}

  async read(feed: FeedDefinition): Promise<FeedEntry[]> {
    const body = await fetchText(feed.url, { timeoutMs: this.options.timeoutMs });
    if (feed.kind === "html") {
      return extractHtmlLinks(body, {
        linkPrefix: feed.link_prefix ?? new URL(feed.url).origin,
        pathIncludes: feed.path_includes,
        maxEntries: this.options.maxEntries
      });
    }
    return parseRssXml(body, feed.url, this.options.maxEntries);
  }
}

export function normaliseText(html: string): string {
  if (!html) {
    return "";
  }
  return htmlToText(html, {
    wordwrap: false,
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      { selector: "img", format: "skip" }
    ]
  })
    .replace(/\s+/g, " ")
    .trim();
}

function parsePublishedAt(value: string | undefined): string | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return date.toISOString();
}

// Candidates must carry a canonical URL; opaque guids are not links.
const linkSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value));

export async function parseRssXml(xml: string, source: string, maxEntries: number): Promise<FeedEntry[]> {
  let feed: Awaited<ReturnType<typeof rssParser.parseString>>;
  try {
    feed = await rssParser.parseString(xml);
  } catch (error) {
    throw new ParseError(source, "feed is not valid RSS/Atom", { cause: error });
  }
  const entries: FeedEntry[] = [];
  for (const item of (feed.items ?? []).slice(0, maxEntries)) {
    const title = normaliseText(item.title ?? "");
    const link = (item.link ?? item.guid ?? "").trim();
    if (!title || !linkSchema.safeParse(link).success) {
      continue;
    }
    entries.push({
      title,
      link,
      summary: normaliseText(item.content ?? item.contentSnippet ?? item.summary ?? ""),
      publishedAt: parsePublishedAt(item.isoDate ?? item.pubDate),
      categories: (item.categories ?? []).filter((category): category is string => typeof category === "string")
    });
  }
  return entries;
}

export interface HtmlLinkOptions {
  linkPrefix: string;
  pathIncludes?: string;
  maxEntries: number;
}

const ANCHOR_RX = /<a\b[^>]*\bhref="([^"]+)"[^>]*>([\s\S]*?)<\/a>/gi;

/** Pulls article links out of a news listing page that has no feed. */
export function extractHtmlLinks(html: string, options: HtmlLinkOptions): FeedEntry[] {
  const entries: FeedEntry[] = [];
  const seen = new Set<string>();
  for (const match of html.matchAll(ANCHOR_RX)) {
    const link = match[1].trim();
    if (!link.startsWith(options.linkPrefix)) continue;
    if (options.pathIncludes && !new URL(link).pathname.includes(options.pathIncludes)) continue;
    const title = normaliseText(match[2]);
    if (!title || /cookie/i.test(title) || seen.has(link)) continue;
    seen.add(link);
    entries.push({ title, link, summary: "", publishedAt: null, categories: [] });
    if (entries.length >= options.maxEntries) break;
  }
  return entries;
}
