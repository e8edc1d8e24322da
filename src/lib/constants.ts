import path from "node:path";

export const ROOT_DIR = process.cwd();
export const CONFIG_PATH = path.resolve(ROOT_DIR, "config.yml");
export const FEEDS_CONFIG_PATH = path.resolve(ROOT_DIR, "feeds.yml");

export const NOTION_API_URL = "https://api.notion.com/v1";
export const NOTION_PAGE_SIZE = 100;
export const NOTION_RICH_TEXT_LIMIT = 2000;

export const MAX_NEWS_PER_SECTION = 4;
export const USER_AGENT = "sports-briefing/0.1 (+https://github.com/)";
