export type PriceIntentRules = {
  /** Names the tracked coin. */
  coin: RegExp;
  /** Market / performance vocabulary. */
  market: RegExp;
};

export const DOGECOIN_INTENT: PriceIntentRules = {
  coin: /(doge\s*coin|dogecoin)/i,
  market: /\b(price|worth|value|market|doing|performance|up|down|trend)\b/i
};

/** Both parts must match: naming the coin alone is not a price question. */
export function hasPriceIntent(text: string, rules: PriceIntentRules = DOGECOIN_INTENT) {
  const s = String(text ?? "");
  if (!s.trim()) return false;
  return rules.coin.test(s) && rules.market.test(s);
}
