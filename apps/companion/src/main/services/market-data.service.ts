import { z } from "zod";
import { NETWORK_TIMEOUT_MS } from "@deskdoge/shared";
import type { PriceQuote } from "@deskdoge/shared";
import type { MarketDataSource } from "../protocol/types";
import { fetchJsonWithTimeout } from "./http";

const MarketRowSchema = z
  .object({
    id: z.string().optional(),
    current_price: z.number().nullable().optional(),
    price_change_percentage_24h: z.number().nullable().optional()
  })
  .passthrough();

const MarketsResponseSchema = z.array(MarketRowSchema);

/** CoinGecko `/coins/markets` quotes for a single coin id. */
export class MarketDataService implements MarketDataSource {
  #baseUrl: string;
  #vsCurrency: string;
  #timeoutMs: number;

  constructor(opts?: { baseUrl?: string; vsCurrency?: string; timeoutMs?: number }) {
    this.#baseUrl = (opts?.baseUrl ?? "https://api.coingecko.com/api/v3").replace(/\/$/, "");
    this.#vsCurrency = opts?.vsCurrency ?? "usd";
    this.#timeoutMs = opts?.timeoutMs ?? NETWORK_TIMEOUT_MS;
  }

  async fetch(assetId: string): Promise<PriceQuote> {
    const url = new URL(`${this.#baseUrl}/coins/markets`);
    url.searchParams.set("vs_currency", this.#vsCurrency);
    url.searchParams.set("ids", assetId);

    const body = await fetchJsonWithTimeout(
      url,
      { method: "GET", headers: { Accept: "application/json" } },
      "market-data",
      this.#timeoutMs
    );
    const rows = MarketsResponseSchema.parse(body);
    const coin = rows[0];
    const price = coin?.current_price;
    if (typeof price !== "number") throw new Error(`[market-data] no price for ${assetId}`);
    return { price, change24h: coin?.price_change_percentage_24h ?? null };
  }
}
