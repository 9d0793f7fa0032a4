import { z } from "zod";
import { NETWORK_TIMEOUT_MS, SEARCH_SNIPPET_MAX } from "@deskdoge/shared";
import type { SearchSource } from "../protocol/types";
import { fetchJsonWithTimeout } from "./http";

const InstantAnswerSchema = z
  .object({
    AbstractText: z.string().optional(),
    Heading: z.string().optional()
  })
  .passthrough();

/**
 * One-shot lookup against the DuckDuckGo Instant Answer API.
 * Returns the abstract, else the heading, else "". Throws on transport/HTTP errors.
 */
export async function instantAnswer(
  query: string,
  opts?: { baseUrl?: string; appName?: string; timeoutMs?: number }
): Promise<string> {
  const q = String(query ?? "").trim();
  if (!q) return "";

  const url = new URL(opts?.baseUrl ?? "https://api.duckduckgo.com");
  url.searchParams.set("q", q);
  url.searchParams.set("format", "json");
  url.searchParams.set("no_html", "1");
  url.searchParams.set("t", opts?.appName ?? "deskdoge");

  const body = await fetchJsonWithTimeout(url, { method: "GET" }, "web-search", opts?.timeoutMs ?? NETWORK_TIMEOUT_MS);
  const data = InstantAnswerSchema.parse(body);
  return (data.AbstractText || data.Heading || "").trim();
}

export class WebSearchService implements SearchSource {
  #enabled: boolean;
  #baseUrl: string;
  #appName: string;
  #timeoutMs: number;
  #maxChars: number;

  constructor(opts?: { enabled?: boolean; baseUrl?: string; appName?: string; timeoutMs?: number; maxChars?: number }) {
    this.#enabled = opts?.enabled ?? true;
    this.#baseUrl = opts?.baseUrl ?? "https://api.duckduckgo.com";
    this.#appName = opts?.appName ?? "deskdoge";
    this.#timeoutMs = opts?.timeoutMs ?? NETWORK_TIMEOUT_MS;
    this.#maxChars = Math.max(1, opts?.maxChars ?? SEARCH_SNIPPET_MAX);
  }

  async query(text: string): Promise<string> {
    if (!this.#enabled) return "";
    try {
      const snippet = await instantAnswer(text, {
        baseUrl: this.#baseUrl,
        appName: this.#appName,
        timeoutMs: this.#timeoutMs
      });
      return snippet.slice(0, this.#maxChars);
    } catch (err) {
      console.warn("[web-search] lookup skipped:", err instanceof Error ? err.message : err);
      return "";
    }
  }
}
