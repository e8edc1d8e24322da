#!/usr/bin/env tsx
import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import ora, { type Ora } from "ora";
import { deliverBriefing } from "../src/briefing/deliver";
import { loadConfig, readNotionToken } from "../src/lib/config";
import { readPayloadFile } from "../src/lib/load-payload";
import { describeError } from "../src/lib/errors";
import { COLORS, GLYPHS, formatDuration, guardConsole } from "../src/lib/log";
import { NotionDocumentStore } from "../src/publish/notion-client";
import { describePublishState } from "../src/publish/publisher";

async function main() {
  const startTime = Date.now();
  let spinner: Ora | null = null;
  guardConsole(() => spinner?.isSpinning ?? false);

  try {
    const { values } = parseArgs({
      options: {
        in: { type: "string" },
        "md-out": { type: "string" }
      }
    });
    const config = await loadConfig();

    let token: string;
    try {
      token = await readNotionToken(config.notion.token_path);
    } catch (error) {
      console.error(`${COLORS.warn}${GLYPHS.warn}${COLORS.reset} ${describeError(error)}`);
      return process.exit(2);
    }

    const source = path.resolve(values.in ?? config.output.finalized_payload);
    const markdownPath = path.resolve(values["md-out"] ?? config.output.markdown);
    const raw = await readPayloadFile(source);

    spinner = ora("Publishing briefing...").start();
    const activeSpinner = spinner;
    const result = await deliverBriefing(raw, {
      config,
      store: new NotionDocumentStore({ token, notion: config.notion }),
      markdownPath,
      onTransition: (state) => {
        activeSpinner.text = describePublishState(state);
      }
    });
    spinner.succeed(`Briefing ${result.outcome} (${result.blockCount} blocks, ${result.removedBlocks} removed)`);

    console.log(`\n${COLORS.success}${GLYPHS.success} "${result.document.title}" published${COLORS.reset}`);
    if (result.document.url) {
      console.log(`  ${COLORS.detail}${GLYPHS.publish} ${result.document.url}${COLORS.reset}`);
    }
    console.log(`  ${COLORS.detail}${GLYPHS.folder} ${path.relative(process.cwd(), result.markdownPath)}${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.timer} Published in ${formatDuration(startTime)}${COLORS.reset}\n`);
    process.exit(0);
  } catch (error) {
    if (spinner) {
      spinner.fail("Publishing failed");
    }
    console.error(`\n${COLORS.warn}Error:${COLORS.reset}`, error);
    process.exit(1);
  }
}

void main();
