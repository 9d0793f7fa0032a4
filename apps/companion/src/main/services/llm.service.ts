import { z } from "zod";
import { NETWORK_TIMEOUT_MS } from "@deskdoge/shared";
import type { CompletionMessage } from "@deskdoge/shared";
import type { CompletionSource } from "../protocol/types";
import { fetchJsonWithTimeout } from "./http";

const ChatCompletionSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            message: z.object({ content: z.string().nullable().optional() }).passthrough()
          })
          .passthrough()
      )
      .min(1)
  })
  .passthrough();

type OpenAICompatibleOpts = {
  name: string;
  baseUrl: string;
  apiKey: string;
  model: string;
};

async function openAICompatibleChat(
  opts: OpenAICompatibleOpts,
  messages: CompletionMessage[],
  timeoutMs: number,
  temperature?: number
) {
  const url = `${opts.baseUrl.replace(/\/$/, "")}/chat/completions`;
  const headers: Record<string, string> = {
    "Content-Type": "application/json"
  };
  if (opts.apiKey) headers.Authorization = `Bearer ${opts.apiKey}`;

  console.log(`[llm-api] ${opts.name} request to ${url}, model=${opts.model}, messages=${messages.length}, timeout=${timeoutMs}ms`);

  const body: Record<string, unknown> = { model: opts.model, messages };
  if (typeof temperature === "number" && Number.isFinite(temperature)) {
    body.temperature = Math.max(0, Math.min(2, temperature));
  }

  const startTime = Date.now();
  let data: unknown;
  try {
    data = await fetchJsonWithTimeout(url, { method: "POST", headers, body: JSON.stringify(body) }, opts.name, timeoutMs);
  } catch (err) {
    const elapsed = Date.now() - startTime;
    console.error(`[llm-api] ${opts.name} request failed after ${elapsed}ms:`, err instanceof Error ? err.message : err);
    throw err;
  }
  console.log(`[llm-api] ${opts.name} response in ${Date.now() - startTime}ms`);

  const parsed = ChatCompletionSchema.safeParse(data);
  const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
  if (typeof content !== "string") {
    throw new Error(`[${opts.name}] unexpected response shape`);
  }
  return content.trim();
}

/** Chat completions against an OpenAI-compatible endpoint. */
export class LLMService implements CompletionSource {
  #baseUrl: string;
  #getApiKey: () => string | null;
  #timeoutMs: number;
  #temperature: number | undefined;

  constructor(opts: { baseUrl?: string; getApiKey: () => string | null; timeoutMs?: number; temperature?: number }) {
    this.#baseUrl = opts.baseUrl ?? "https://api.openai.com/v1";
    this.#getApiKey = opts.getApiKey;
    this.#timeoutMs = opts.timeoutMs ?? NETWORK_TIMEOUT_MS;
    this.#temperature = opts.temperature;
  }

  isConfigured() {
    return Boolean(this.#getApiKey());
  }

  async complete(model: string, messages: CompletionMessage[]): Promise<string> {
    const apiKey = this.#getApiKey();
    if (!apiKey) throw new Error("[llm] missing API key");
    return openAICompatibleChat(
      { name: "openai", baseUrl: this.#baseUrl, apiKey, model },
      messages,
      this.#timeoutMs,
      this.#temperature
    );
  }
}
