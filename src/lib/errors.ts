/** A provider or feed could not be reached, timed out, or answered with a non-2xx status. */
export class SourceUnavailableError extends Error {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${source}: ${message}`, options);
    this.name = "SourceUnavailableError";
  }
}

/** A source answered, but with data that could not be parsed into the expected shape. */
export class ParseError extends Error {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${source}: ${message}`, options);
    this.name = "ParseError";
  }
}

export type PublishStep = "search" | "create" | "archive" | "category" | "list" | "delete" | "append";

/** The document store rejected one step of a publish. Fatal for the run. */
export class PublishError extends Error {
  constructor(
    readonly step: PublishStep,
    readonly title: string,
    readonly collectionId: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Publishing "${title}" to collection ${collectionId} failed at ${step}${reason}`, options);
    this.name = "PublishError";
  }
}

/** The finalized payload does not match the document schema. Raised before any publish. */
export class SchemaViolationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Finalized payload is invalid:\n${issues.map((issue) => `- ${issue}`).join("\n")}`);
    this.name = "SchemaViolationError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
