import { describe, expect, it } from "vitest";
import { hasPriceIntent } from "../agent/price-intent";

describe("hasPriceIntent", () => {
  it.each([
    "What's the dogecoin price?",
    "how is doge coin doing today",
    "Is DOGECOIN up or down?",
    "dogecoin market trend"
  ])("matches %j", (text) => {
    expect(hasPriceIntent(text)).toBe(true);
  });

  it.each([
    "tell me about dogecoin",
    "what is the price of bitcoin",
    "doge is a good boy",
    "   ",
    "dogecoins uptime"
  ])("does not match %j", (text) => {
    expect(hasPriceIntent(text)).toBe(false);
  });

  it("accepts custom rules", () => {
    expect(hasPriceIntent("shiba value", { coin: /shiba/i, market: /\bvalue\b/i })).toBe(true);
  });
});
