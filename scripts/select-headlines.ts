#!/usr/bin/env tsx
import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import ora, { type Ora } from "ora";
import { HeadlineSelector } from "../src/briefing/select-news";
import { loadConfig } from "../src/lib/config";
import { readPayloadFile, writePayloadFile } from "../src/lib/load-payload";
import { COLORS, GLYPHS, guardConsole, logSuccess } from "../src/lib/log";
import { parseGatheredPayload } from "../src/lib/validate-briefing";

/**
 * Offline selection: keeps the newest candidates of each section with the
 * feed summary as recap. Replace with an editor or model for curated picks.
 */
async function main() {
  let spinner: Ora | null = null;
  guardConsole(() => spinner?.isSpinning ?? false);

  try {
    const { values } = parseArgs({
      options: {
        in: { type: "string" },
        out: { type: "string" }
      }
    });
    const config = await loadConfig();
    const source = path.resolve(values.in ?? config.output.gathered_payload);
    const target = path.resolve(values.out ?? config.output.finalized_payload);

    spinner = ora(`Reading ${path.relative(process.cwd(), source)}...`).start();
    const gathered = parseGatheredPayload(await readPayloadFile(source));
    spinner.succeed(`Gathered payload for ${gathered.date} loaded`);

    const finalized = await new HeadlineSelector().select(gathered);
    await writePayloadFile(target, finalized);

    const picked = finalized.sections.reduce((sum, section) => sum + section.news.length, 0);
    logSuccess("Finalized payload written");
    console.log(`  ${COLORS.detail}${GLYPHS.folder} ${path.relative(process.cwd(), target)}${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.stats} ${picked} news items selected${COLORS.reset}\n`);
    process.exit(0);
  } catch (error) {
    if (spinner) {
      spinner.fail("Selection failed");
    }
    console.error(`\n${COLORS.warn}Error:${COLORS.reset}`, error);
    process.exit(1);
  }
}

void main();
