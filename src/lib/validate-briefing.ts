import { z } from "zod";
import { MAX_NEWS_PER_SECTION } from "./constants";
import { SchemaViolationError } from "./errors";
import { TOPIC_KEYS } from "./topics";
import type { FinalizedPayload, GatheredPayload } from "./types";

const tableSchema = z
  .object({
    header: z.array(z.string()).min(1),
    rows: z.array(z.array(z.string()))
  })
  .superRefine((table, ctx) => {
    table.rows.forEach((row, index) => {
      if (row.length !== table.header.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rows", index],
          message: `row has ${row.length} cells, header has ${table.header.length}`
        });
      }
    });
  });

const newsItemSchema = z.object({
  title: z.string().trim().min(1),
  link: z.string().url(),
  recap: z.string().trim().min(1, { message: "recap must not be empty" })
});

const candidateSchema = z.object({
  title: z.string(),
  link: z.string(),
  summary: z.string(),
  publishedAt: z.string().nullable(),
  source: z.string()
});

function inTopicOrder(sections: Array<{ topic: string }>, ctx: z.RefinementCtx) {
  if (sections.length !== TOPIC_KEYS.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["sections"],
      message: `expected ${TOPIC_KEYS.length} sections, got ${sections.length}`
    });
    return;
  }
  sections.forEach((section, index) => {
    if (section.topic !== TOPIC_KEYS[index]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["sections", index, "topic"],
        message: `expected "${TOPIC_KEYS[index]}" at this position, got "${section.topic}"`
      });
    }
  });
}

export const finalizedPayloadSchema = z
  .object({
    pageTitle: z.string().trim().min(1),
    intro: z.string(),
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, { message: "date must be YYYY-MM-DD" }).optional(),
    sections: z.array(
      z.object({
        topic: z.enum(TOPIC_KEYS),
        title: z.string().trim().min(1),
        table: tableSchema,
        news: z.array(newsItemSchema).max(MAX_NEWS_PER_SECTION, {
          message: `at most ${MAX_NEWS_PER_SECTION} news items per section`
        })
      })
    )
  })
  .superRefine((payload, ctx) => inTopicOrder(payload.sections, ctx));

export const gatheredPayloadSchema = z
  .object({
    pageTitle: z.string().trim().min(1),
    intro: z.string(),
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    timezone: z.string(),
    generatedAt: z.string(),
    sections: z.array(
      z.object({
        topic: z.enum(TOPIC_KEYS),
        title: z.string(),
        table: tableSchema,
        candidates: z.array(candidateSchema)
      })
    )
  })
  .superRefine((payload, ctx) => inTopicOrder(payload.sections, ctx));

function toIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const issuePath = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${issuePath}: ${issue.message}`;
  });
}

/** Validates the selection step's output. Throws SchemaViolationError before anything is published. */
export function parseFinalizedPayload(raw: unknown): FinalizedPayload {
  const result = finalizedPayloadSchema.safeParse(raw);
  if (!result.success) {
    throw new SchemaViolationError(toIssues(result.error));
  }
  return result.data;
}

export function parseGatheredPayload(raw: unknown): GatheredPayload {
  const result = gatheredPayloadSchema.safeParse(raw);
  if (!result.success) {
    throw new SchemaViolationError(toIssues(result.error));
  }
  return result.data;
}
