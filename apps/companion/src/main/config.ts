import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import {
  ANIMATION_TIMING,
  BUBBLE_GAP_PX,
  BUBBLE_SIZES,
  BUBBLE_TTL_MS,
  CHAT_HISTORY_MAX,
  NETWORK_TIMEOUT_MS,
  PRICE_TTL_MS,
  SEARCH_SNIPPET_MAX
} from "@deskdoge/shared";
import type { AppConfig } from "./protocol/types";
import { DEFAULT_ANIMATION_DIRS } from "./services/asset.service";
import { DEFAULT_CREDENTIAL_PATH } from "./services/credential.service";

const positiveInt = z.number().int().positive();
const sizeSchema = (d: { width: number; height: number }) =>
  z.object({ width: positiveInt.default(d.width), height: positiveInt.default(d.height) }).default({});

const AppConfigSchema = z.object({
  persona: z
    .object({
      name: z.string().min(1).default("Doge"),
      maxWords: positiveInt.default(25)
    })
    .default({}),
  llm: z
    .object({
      baseUrl: z.string().url().default("https://api.openai.com/v1"),
      model: z.string().min(1).default("gpt-4o-mini"),
      timeoutMs: positiveInt.default(NETWORK_TIMEOUT_MS),
      temperature: z.number().min(0).max(2).optional()
    })
    .default({}),
  price: z
    .object({
      assetId: z.string().min(1).default("dogecoin"),
      label: z.string().min(1).default("Dogecoin"),
      vsCurrency: z.string().min(1).default("usd"),
      baseUrl: z.string().url().default("https://api.coingecko.com/api/v3"),
      ttlMs: positiveInt.default(PRICE_TTL_MS),
      timeoutMs: positiveInt.default(NETWORK_TIMEOUT_MS),
      firstShowDelayMs: z.number().int().nonnegative().default(2000),
      intervalMs: positiveInt.default(600_000),
      unavailableText: z.string().default("Price unavailable.")
    })
    .default({}),
  search: z
    .object({
      enabled: z.boolean().default(true),
      baseUrl: z.string().url().default("https://api.duckduckgo.com"),
      appName: z.string().default("deskdoge"),
      timeoutMs: positiveInt.default(NETWORK_TIMEOUT_MS),
      maxChars: positiveInt.default(SEARCH_SNIPPET_MAX)
    })
    .default({}),
  chat: z
    .object({
      historyMax: positiveInt.default(CHAT_HISTORY_MAX),
      failureText: z.string().min(1).default("Much error. Try again later.")
    })
    .default({}),
  animation: z
    .object({
      frameIntervalMs: positiveInt.default(ANIMATION_TIMING.frameIntervalMs),
      revertMs: positiveInt.default(ANIMATION_TIMING.revertMs)
    })
    .default({}),
  bubbles: z
    .object({
      gap: z.number().int().nonnegative().default(BUBBLE_GAP_PX),
      chatTtlMs: positiveInt.default(BUBBLE_TTL_MS.chat),
      priceTtlMs: positiveInt.default(BUBBLE_TTL_MS.price),
      sizes: z
        .object({
          chat: sizeSchema(BUBBLE_SIZES.chat),
          price: sizeSchema(BUBBLE_SIZES.price),
          input: sizeSchema(BUBBLE_SIZES.input)
        })
        .default({})
    })
    .default({}),
  window: z
    .object({
      x: z.number().int().default(1200),
      y: z.number().int().default(700),
      width: positiveInt.default(160),
      height: positiveInt.default(160)
    })
    .default({}),
  credential: z.object({ path: z.string().default("") }).default({}),
  assets: z
    .object({
      dir: z.string().default("assets"),
      animations: z
        .object({
          idle: z.string().default(DEFAULT_ANIMATION_DIRS.idle),
          happy: z.string().default(DEFAULT_ANIMATION_DIRS.happy),
          laugh: z.string().default(DEFAULT_ANIMATION_DIRS.laugh),
          wow: z.string().default(DEFAULT_ANIMATION_DIRS.wow),
          sad: z.string().default(DEFAULT_ANIMATION_DIRS.sad),
          thinking: z.string().default(DEFAULT_ANIMATION_DIRS.thinking)
        })
        .default({})
    })
    .default({})
});

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function mergeDeep(base: unknown, over: unknown): unknown {
  if (!isRecord(base) || !isRecord(over)) return over === undefined ? base : over;
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(over)) out[k] = mergeDeep(base[k], v);
  return out;
}

function readJsonFile(path: string): unknown {
  if (!existsSync(path)) return {};
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    console.warn(`[config] ignoring unreadable ${path}:`, err instanceof Error ? err.message : err);
    return {};
  }
}

function expandHome(p: string) {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) return join(homedir(), p.slice(2));
  return p;
}

/**
 * `config.json` with `config.local.json` (same directory) layered on top, then env overrides.
 * Relative paths resolve against the config file's directory.
 */
export function readAppConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const baseDir = dirname(configPath);
  const base = readJsonFile(configPath);
  const local = readJsonFile(resolve(baseDir, "config.local.json"));

  const parsed = AppConfigSchema.safeParse(mergeDeep(base, local));
  const config = parsed.success ? parsed.data : AppConfigSchema.parse({});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    console.warn(`[config] invalid config (${issue?.path.join(".")}: ${issue?.message}), using defaults`);
  }

  const baseUrl = String(env.OPENAI_BASE_URL ?? "").trim();
  if (baseUrl) config.llm.baseUrl = baseUrl;
  const model = String(env.OPENAI_MODEL ?? "").trim();
  if (model) config.llm.model = model;

  const credentialPath = String(env.DESKDOGE_CREDENTIAL_PATH ?? "").trim() || config.credential.path;
  config.credential.path = credentialPath ? resolve(baseDir, expandHome(credentialPath)) : DEFAULT_CREDENTIAL_PATH;

  const assetsDir = expandHome(String(env.DESKDOGE_ASSETS_DIR ?? "").trim() || config.assets.dir);
  config.assets.dir = isAbsolute(assetsDir) ? assetsDir : resolve(baseDir, assetsDir);

  return config;
}
