import { PRICE_TTL_MS } from "@deskdoge/shared";
import type { PriceQuote, PriceSnapshot } from "@deskdoge/shared";
import type { MarketDataSource } from "../protocol/types";

export function formatPriceSnippet(label: string, quote: PriceQuote) {
  const price = `$${quote.price.toFixed(4)} USD`;
  const change = quote.change24h;
  if (change === null || !Number.isFinite(change)) return `${label} price: ${price}.`;
  const signed = `${change >= 0 ? "+" : ""}${change.toFixed(2)}`;
  return `${label} price: ${price} (24h ${signed}%).`;
}

/**
 * Read-through cache over one market-data quote.
 *
 * An empty string from `get` means "unavailable right now": a failed refresh
 * leaves the last good snapshot in place.
 */
export class PriceCache {
  #market: MarketDataSource;
  #now: () => number;
  #assetId: string;
  #label: string;
  #ttlMs: number;

  #snapshot: PriceSnapshot | null = null;
  #inFlight: Promise<string> | null = null;
  #fetchCount = 0;

  constructor(opts: {
    market: MarketDataSource;
    now: () => number;
    assetId?: string;
    label?: string;
    ttlMs?: number;
  }) {
    this.#market = opts.market;
    this.#now = opts.now;
    this.#assetId = opts.assetId ?? "dogecoin";
    this.#label = opts.label ?? "Dogecoin";
    this.#ttlMs = Math.max(0, Number(opts.ttlMs ?? PRICE_TTL_MS));
  }

  get fetchCount() {
    return this.#fetchCount;
  }

  /** Last successful snapshot, however old. */
  peek(): PriceSnapshot | null {
    return this.#snapshot;
  }

  /** Cached snippet while it is still fresh; never touches the network. */
  peekFresh() {
    return this.#isFresh() ? (this.#snapshot?.snippet ?? "") : "";
  }

  async get(forceRefresh = false): Promise<string> {
    if (!forceRefresh && this.#isFresh()) return this.#snapshot?.snippet ?? "";
    if (this.#inFlight) return this.#inFlight;

    this.#inFlight = this.#refresh();
    try {
      return await this.#inFlight;
    } finally {
      this.#inFlight = null;
    }
  }

  #isFresh() {
    const snap = this.#snapshot;
    if (!snap) return false;
    return this.#now() - snap.fetchedAt < this.#ttlMs;
  }

  async #refresh(): Promise<string> {
    this.#fetchCount += 1;
    try {
      const quote = await this.#market.fetch(this.#assetId);
      if (!Number.isFinite(quote.price)) throw new Error(`non-numeric price for ${this.#assetId}`);
      const snippet = formatPriceSnippet(this.#label, quote);
      this.#snapshot = { ...quote, fetchedAt: this.#now(), snippet };
      return snippet;
    } catch (err) {
      console.warn(`[price] ${this.#assetId} refresh failed, keeping previous snapshot:`, err);
      return "";
    }
  }
}
