// Shared protocol types for the companion runtime

import type { MOOD_TAGS } from "./constants";

export type AnimationKey = "idle" | "happy" | "laugh" | "wow" | "sad" | "thinking";

/** Persistent states stay until replaced; every other state reverts to idle. */
export const PERSISTENT_ANIMATIONS: readonly AnimationKey[] = ["idle", "thinking"];

export type Mood = (typeof MOOD_TAGS)[number];

export type BubbleKind = "chat" | "price" | "input";

export type Point = { x: number; y: number };
export type Size = { width: number; height: number };

/** Window frame in screen coordinates (top-left origin, y grows downward). */
export type Rect = Point & Size;

export type ChatRole = "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type CompletionMessage = {
  role: "system" | ChatRole;
  content: string;
};

export type PointerEvent =
  | { type: "POINTER"; ts: number; event: "PRESS"; x: number; y: number }
  | { type: "POINTER"; ts: number; event: "DRAG"; dx: number; dy: number }
  | { type: "POINTER"; ts: number; event: "RELEASE"; clickCount: number }
  | { type: "POINTER"; ts: number; event: "DOUBLE_CLICK" }
  | { type: "POINTER"; ts: number; event: "RIGHT_CLICK"; x: number; y: number };

export type ErrorKind =
  | "UserCancelled"
  | "ConcurrentRequestRejected"
  | "AssetMissing"
  | "EnrichmentUnavailable"
  | "CompletionFailure";

/** Result of a chat initiation attempt (double click). */
export type InitiateOutcome =
  | { ok: true }
  | { ok: false; reason: Extract<ErrorKind, "UserCancelled" | "ConcurrentRequestRejected"> };

/** Typed hand-off from the background unit to the UI-owning context. */
export type CompletionEvent =
  | { kind: "REPLY"; payload: { text: string; mood: Mood; raw: string } }
  | { kind: "FAILURE"; payload: { error: Extract<ErrorKind, "CompletionFailure">; message: string } };

export type ConversationPhase = "idle" | "credential-check" | "input-open" | "dispatched" | "rendering";

export type PriceQuote = {
  price: number;
  change24h: number | null;
};

export type PriceSnapshot = PriceQuote & {
  fetchedAt: number;
  snippet: string;
};

export type AnimationChange = {
  type: "ANIMATION_CHANGE";
  ts: number;
  from: AnimationKey;
  to: AnimationKey;
  generation: number;
};
