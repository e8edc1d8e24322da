#!/usr/bin/env tsx
import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import ora, { type Ora } from "ora";
import { persistPayload } from "../src/briefing/assemble";
import { gatherBriefing } from "../src/briefing/gather";
import { SofascoreProvider } from "../src/events/sofascore-client";
import { loadConfig } from "../src/lib/config";
import { COLORS, GLYPHS, formatDuration, guardConsole } from "../src/lib/log";
import { concurrencyFromEnv } from "../src/lib/pool";
import { HttpFeedReader } from "../src/news/feed-reader";

const EVENT_CONCURRENCY = concurrencyFromEnv(process.env.EVENT_CONCURRENCY, 4, 8);
const FEED_CONCURRENCY = concurrencyFromEnv(process.env.FEED_CONCURRENCY, 6, 16);

async function main() {
  const startTime = Date.now();
  let spinner: Ora | null = null;
  guardConsole(() => spinner?.isSpinning ?? false);

  try {
    const { values } = parseArgs({ options: { out: { type: "string" } } });

    spinner = ora("Loading configuration...").start();
    const config = await loadConfig();
    spinner.succeed(`Configuration loaded (${config.feeds.length} feeds, ${config.timezone})`);

    spinner = ora("Gathering events and news...").start();
    const payload = await gatherBriefing({
      config,
      provider: new SofascoreProvider(config.provider),
      reader: new HttpFeedReader({
        timeoutMs: config.news.timeout_ms,
        maxEntries: config.news.max_entries_per_feed
      }),
      now: new Date(),
      eventConcurrency: EVENT_CONCURRENCY,
      feedConcurrency: FEED_CONCURRENCY
    });
    spinner.succeed(`Gathered ${payload.sections.length} sections for ${payload.date}`);

    const target = path.resolve(values.out ?? config.output.gathered_payload);
    await persistPayload(target, payload);

    const rows = payload.sections.reduce((sum, section) => sum + section.table.rows.length, 0);
    const candidates = payload.sections.reduce((sum, section) => sum + section.candidates.length, 0);
    console.log(`\n${COLORS.success}${GLYPHS.success} Payload written${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.folder} ${path.relative(process.cwd(), target)}${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.stats} ${rows} event rows, ${candidates} news candidates${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.timer} Gathered in ${formatDuration(startTime)}${COLORS.reset}\n`);
    process.exit(0);
  } catch (error) {
    if (spinner) {
      spinner.fail("Gathering failed");
    }
    console.error(`\n${COLORS.warn}Error:${COLORS.reset}`, error);
    process.exit(1);
  }
}

void main();
