#!/usr/bin/env tsx

/**
 * Validation script for config.yml and feeds.yml files
 *
 * Usage:
 *   npm run validate:config
 *
 * Validates both files against the same schemas the briefing loads them with,
 * and warns about topics no feed covers.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "yaml";
import { z } from "zod";
import { configSchema, feedsSchema } from "../src/lib/config";
import { TOPICS } from "../src/lib/topics";

interface ValidationError {
  file: string;
  field: string;
  message: string;
}

const errors: ValidationError[] = [];
const warnings: string[] = [];

function addError(file: string, field: string, message: string): void {
  errors.push({ file, field, message });
}

function readYaml(filePath: string): unknown {
  if (!existsSync(filePath)) {
    addError(filePath, "file", "File does not exist");
    return undefined;
  }
  try {
    return parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    addError(filePath, "file", `Failed to parse YAML: ${err}`);
    return undefined;
  }
}

function collectIssues(filePath: string, error: z.ZodError): void {
  for (const issue of error.issues) {
    addError(filePath, issue.path.length > 0 ? issue.path.join(".") : "<root>", issue.message);
  }
}

function validateConfig(configPath: string): void {
  const raw = readYaml(configPath);
  if (raw === undefined) return;
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    collectIssues(configPath, result.error);
    return;
  }
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: result.data.timezone });
  } catch {
    addError(configPath, "timezone", `Unknown time zone "${result.data.timezone}"`);
  }
}

function validateFeeds(feedsPath: string): void {
  const raw = readYaml(feedsPath);
  if (raw === undefined) return;
  const result = feedsSchema.safeParse(raw);
  if (!result.success) {
    collectIssues(feedsPath, result.error);
    return;
  }
  const covered = new Set(result.data.feeds.flatMap((feed) => feed.topics.map((binding) => binding.news_key)));
  for (const topic of TOPICS) {
    if (!covered.has(topic.newsKey)) {
      warnings.push(`No feed covers "${topic.newsKey}"; ${topic.title} will have no news candidates`);
    }
  }
}

function main(): void {
  console.log("🔍 Validating configuration files...\n");

  const configPath = resolve(process.cwd(), "config.yml");
  const feedsPath = resolve(process.cwd(), "feeds.yml");

  validateConfig(configPath);
  validateFeeds(feedsPath);

  for (const warning of warnings) {
    console.warn(`⚠ ${warning}`);
  }

  if (errors.length === 0) {
    console.log("✅ All configuration files are valid!\n");
    process.exit(0);
  } else {
    console.error("❌ Validation errors found:\n");
    errors.forEach((error) => {
      console.error(`  ${error.file}`);
      console.error(`    Field: ${error.field}`);
      console.error(`    Error: ${error.message}\n`);
    });
    process.exit(1);
  }
}

main();
