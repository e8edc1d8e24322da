import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { CONFIG_PATH, FEEDS_CONFIG_PATH } from "./constants";
import { DEFAULT_LANGUAGE } from "./i18n";
import { TOPICS } from "./topics";
import type { BriefingConfig } from "./types";

export const configSchema = z.object({
  timezone: z.string().default("Europe/Rome"),
  language: z.enum(["it", "en"]).default(DEFAULT_LANGUAGE),
  provider: z.object({
    base_url: z.string().url(),
    sessions_base_url: z.string().url(),
    timeout_ms: z.number().int().min(1).max(120_000)
  }),
  events: z.object({
    match_limit: z.number().int().min(1).max(10).default(2),
    session_limit: z.number().int().min(1).max(50).default(30),
    stage_lookback_days: z.number().int().min(0).max(30).default(7),
    max_stage_candidates: z.number().int().min(1).max(20).default(10)
  }),
  news: z.object({
    timeout_ms: z.number().int().min(1).max(120_000),
    max_entries_per_feed: z.number().int().min(1).max(200).default(60),
    max_candidates: z.number().int().min(4).max(50).default(12)
  }),
  notion: z.object({
    database_id: z.string().min(1),
    title_property: z.string().min(1),
    category_property: z.string().min(1),
    category: z.string().min(1),
    token_path: z.string().min(1),
    version: z.string().default("2022-06-28"),
    timeout_ms: z.number().int().min(1).max(120_000)
  }),
  output: z.object({
    gathered_payload: z.string().min(1),
    finalized_payload: z.string().min(1),
    markdown: z.string().min(1)
  })
});

const knownNewsKeys = new Set(TOPICS.map((topic) => topic.newsKey));

export const feedsSchema = z.object({
  feeds: z
    .array(
      z.object({
        title: z.string(),
        url: z.string().url(),
        kind: z.enum(["rss", "html"]).default("rss"),
        link_prefix: z.string().url().optional(),
        path_includes: z.string().optional(),
        topics: z
          .array(
            z.object({
              news_key: z.string().refine((key) => knownNewsKeys.has(key), {
                message: "unknown news_key"
              }),
              keywords: z.array(z.string().min(1)).optional()
            })
          )
          .min(1)
      })
    )
    .min(1)
});

export async function loadConfig(configPath = CONFIG_PATH, feedsPath = FEEDS_CONFIG_PATH): Promise<BriefingConfig> {
  try {
    const configRaw = await fs.readFile(configPath, "utf8");
    const config = configSchema.parse(YAML.parse(configRaw));

    const feedsRaw = await fs.readFile(feedsPath, "utf8");
    const feedsData = feedsSchema.parse(YAML.parse(feedsRaw));

    return {
      ...config,
      output: {
        gathered_payload: path.resolve(config.output.gathered_payload),
        finalized_payload: path.resolve(config.output.finalized_payload),
        markdown: path.resolve(config.output.markdown)
      },
      feeds: feedsData.feeds
    };
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      const missingFile = path.basename((error as NodeJS.ErrnoException).path ?? configPath);
      throw new Error(`${missingFile} is missing. Create it at the repository root before running the briefing.`);
    }
    if (error instanceof z.ZodError) {
      throw new Error(`Configuration is invalid:\n${formatZodIssues(error)}`);
    }
    throw error;
  }
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const issuePath = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `- ${issuePath}: ${issue.message}`;
    })
    .join("\n");
}

export function expandHome(filePath: string): string {
  if (filePath === "~") return os.homedir();
  if (filePath.startsWith("~/")) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

export async function readNotionToken(tokenPath: string): Promise<string> {
  const resolved = expandHome(tokenPath);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`Notion token file not found at ${resolved}.`);
    }
    throw error;
  }
  const token = raw.trim();
  if (!token) {
    throw new Error(`Notion token file ${resolved} is empty.`);
  }
  return token;
}
