import fs from "node:fs/promises";
import path from "node:path";
import { ParseError } from "./errors";

export async function readPayloadFile(target: string): Promise<unknown> {
  let file: string;
  try {
    file = await fs.readFile(target, "utf8");
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`Payload file not found: ${target}`);
    }
    throw error;
  }
  try {
    return JSON.parse(file);
  } catch (error) {
    throw new ParseError(target, "payload is not valid JSON", { cause: error });
  }
}

export async function writePayloadFile(target: string, payload: unknown): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}

export async function writeTextFile(target: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, contents, "utf8");
}
