export const BUS_CHANNELS = {
  pointer: "bus:pointer",
  completion: "bus:completion",
  animation: "bus:animation"
} as const;

export const ANIMATION_TIMING = {
  /** Frame advance interval (~17 Hz). Also drives bubble re-layout. */
  frameIntervalMs: 60,
  /** Transient moods fall back to idle after this long. */
  revertMs: 6000
} as const;

export const BUBBLE_TTL_MS = {
  chat: 4000,
  price: 3500,
  input: null
} as const;

export const BUBBLE_SIZES = {
  chat: { width: 220, height: 100 },
  price: { width: 200, height: 60 },
  input: { width: 260, height: 120 }
} as const;

export const BUBBLE_GAP_PX = 10;

export const CHAT_HISTORY_MAX = 12;

// Each network call is bounded; there is no way to cancel an attempt in flight.
export const NETWORK_TIMEOUT_MS = 5000;

export const PRICE_TTL_MS = 3_600_000;

export const SEARCH_SNIPPET_MAX = 700;

export const MOOD_TAGS = ["HAPPY", "LAUGH", "WOW", "SAD", "THINK"] as const;

export const DEFAULT_MOOD = "HAPPY" as const;
