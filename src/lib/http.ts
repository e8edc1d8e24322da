import { ParseError, SourceUnavailableError, describeError } from "./errors";
import { USER_AGENT } from "./constants";

export interface FetchOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

export interface FetchedText {
  ok: boolean;
  status: number;
  text: string;
}

/**
 * Fetches `url` and reads the whole body under one timer, so a source that
 * sends headers and then stalls is aborted too.
 */
export async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<FetchedText> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    const text = await response.text();
    return { ok: response.ok, status: response.status, text };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`timed out after ${timeoutMs}ms`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

export async function fetchText(url: string, options: FetchOptions): Promise<string> {
  let response: FetchedText;
  try {
    response = await fetchWithTimeout(
      url,
      { headers: { "User-Agent": USER_AGENT, ...options.headers } },
      options.timeoutMs
    );
  } catch (error) {
    throw new SourceUnavailableError(url, describeError(error), { cause: error });
  }
  if (!response.ok) {
    throw new SourceUnavailableError(url, `HTTP ${response.status}`);
  }
  return response.text;
}

export async function fetchJson(url: string, options: FetchOptions): Promise<unknown> {
  const text = await fetchText(url, {
    ...options,
    headers: { Accept: "application/json", ...options.headers }
  });
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(url, "response is not valid JSON", { cause: error });
  }
}
