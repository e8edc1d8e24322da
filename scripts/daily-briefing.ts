#!/usr/bin/env tsx
import path from "node:path";
import process from "node:process";
import ora, { type Ora } from "ora";
import { persistPayload } from "../src/briefing/assemble";
import { deliverBriefing } from "../src/briefing/deliver";
import { gatherBriefing } from "../src/briefing/gather";
import { HeadlineSelector } from "../src/briefing/select-news";
import { SofascoreProvider } from "../src/events/sofascore-client";
import { loadConfig, readNotionToken } from "../src/lib/config";
import { describeError } from "../src/lib/errors";
import { writePayloadFile } from "../src/lib/load-payload";
import { COLORS, GLYPHS, formatDuration, guardConsole, logDetail, logInfo } from "../src/lib/log";
import { concurrencyFromEnv } from "../src/lib/pool";
import { HttpFeedReader } from "../src/news/feed-reader";
import { NotionDocumentStore } from "../src/publish/notion-client";
import { describePublishState } from "../src/publish/publisher";

const EVENT_CONCURRENCY = concurrencyFromEnv(process.env.EVENT_CONCURRENCY, 4, 8);
const FEED_CONCURRENCY = concurrencyFromEnv(process.env.FEED_CONCURRENCY, 6, 16);

// Unattended run: gather, pick headlines, publish, mirror.
async function main() {
  const startTime = Date.now();
  let spinner: Ora | null = null;
  guardConsole(() => spinner?.isSpinning ?? false);

  try {
    spinner = ora("Loading configuration...").start();
    const config = await loadConfig();
    spinner.succeed(`Configuration loaded (${config.feeds.length} feeds, ${config.timezone})`);

    let token: string;
    try {
      token = await readNotionToken(config.notion.token_path);
    } catch (error) {
      console.error(`${COLORS.warn}${GLYPHS.warn}${COLORS.reset} ${describeError(error)}`);
      return process.exit(2);
    }

    spinner = ora("Gathering events and news...").start();
    const gathered = await gatherBriefing({
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
    await persistPayload(config.output.gathered_payload, gathered);
    spinner.succeed(`Gathered ${gathered.sections.length} sections for ${gathered.date}`);

    const finalized = await new HeadlineSelector().select(gathered);
    await writePayloadFile(config.output.finalized_payload, finalized);
    const picked = finalized.sections.reduce((sum, section) => sum + section.news.length, 0);
    logInfo(GLYPHS.briefing, `${picked} headlines selected`);
    logDetail(GLYPHS.folder, path.relative(process.cwd(), config.output.finalized_payload));

    spinner = ora("Publishing briefing...").start();
    const activeSpinner = spinner;
    const result = await deliverBriefing(finalized, {
      config,
      store: new NotionDocumentStore({ token, notion: config.notion }),
      markdownPath: config.output.markdown,
      onTransition: (state) => {
        activeSpinner.text = describePublishState(state);
      }
    });
    spinner.succeed(`Briefing ${result.outcome} (${result.blockCount} blocks)`);

    console.log(`\n${COLORS.success}${GLYPHS.briefing} ${result.document.title}${COLORS.reset}`);
    if (result.document.url) {
      console.log(`  ${COLORS.detail}${GLYPHS.publish} ${result.document.url}${COLORS.reset}`);
    }
    console.log(`  ${COLORS.detail}${GLYPHS.folder} ${path.relative(process.cwd(), result.markdownPath)}${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.timer} Completed in ${formatDuration(startTime)}${COLORS.reset}\n`);
    process.exit(0);
  } catch (error) {
    if (spinner) {
      spinner.fail("Daily briefing failed");
    }
    console.error(`\n${COLORS.warn}Error:${COLORS.reset}`, error);
    process.exit(1);
  }
}

void main();
