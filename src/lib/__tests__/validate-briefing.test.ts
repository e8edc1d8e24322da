import { describe, expect, it } from "vitest";
import { finalizedPayload } from "@/briefing/__tests__/fixtures";
import { SchemaViolationError } from "@/lib/errors";
import { parseFinalizedPayload, parseGatheredPayload } from "@/lib/validate-briefing";

const item = (index: number) => ({
  title: `Notizia ${index}`,
  link: `https://news.example.com/${index}`,
  recap: "Test."
});

function issuesOf(raw: unknown): string[] {
  try {
    parseFinalizedPayload(raw);
  } catch (error) {
    if (error instanceof SchemaViolationError) return error.issues;
    throw error;
  }
  return [];
}

describe("parseFinalizedPayload", () => {
  it("accepts a well-formed payload", () => {
    const payload = finalizedPayload({ fiorentina: { news: [item(1)] } });

    expect(parseFinalizedPayload(payload)).toEqual(payload);
  });

  it("accepts a payload without a date", () => {
    const { date: _date, ...rest } = finalizedPayload();

    expect(parseFinalizedPayload(rest).date).toBeUndefined();
  });

  it("rejects more than four news items in a section", () => {
    const payload = finalizedPayload({ milan: { news: [1, 2, 3, 4, 5].map(item) } });

    expect(issuesOf(payload)).toEqual(["sections.1.news: at most 4 news items per section"]);
  });

  it("rejects an empty recap", () => {
    const payload = finalizedPayload({ sinner: { news: [{ ...item(1), recap: "   " }] } });

    expect(issuesOf(payload)).toEqual(["sections.2.news.0.recap: recap must not be empty"]);
  });

  it("rejects sections out of topic order", () => {
    const payload = finalizedPayload();
    const [first, second, ...rest] = payload.sections;

    const issues = issuesOf({ ...payload, sections: [second, first, ...rest] });

    expect(issues).toEqual([
      'sections.0.topic: expected "fiorentina" at this position, got "milan"',
      'sections.1.topic: expected "milan" at this position, got "fiorentina"'
    ]);
  });

  it("rejects rows wider than the header", () => {
    const payload = finalizedPayload({
      f1: { table: { header: ["Session", "Type", "When"], rows: [["Race", "Race", "Today", "extra"]] } }
    });

    expect(issuesOf(payload)).toEqual(["sections.6.table.rows.0: row has 4 cells, header has 3"]);
  });

  it("names the root when the payload is not an object", () => {
    expect(() => parseFinalizedPayload("nope")).toThrow(SchemaViolationError);
    expect(issuesOf("nope")).toEqual(["<root>: Expected object, received string"]);
  });
});

describe("parseGatheredPayload", () => {
  it("requires candidates on every section", () => {
    const payload = {
      ...finalizedPayload(),
      timezone: "Europe/Rome",
      generatedAt: "2026-10-19T06:00:00.000Z"
    };

    expect(() => parseGatheredPayload(payload)).toThrow(SchemaViolationError);
  });
});
