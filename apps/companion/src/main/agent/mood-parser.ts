/**
 * Mood tag parser: extracts the trailing `<mood:TAG>` marker from a completion reply.
 */

import { DEFAULT_MOOD, MOOD_TAGS } from "@deskdoge/shared";
import type { AnimationKey, Mood } from "@deskdoge/shared";

export type ParsedReply = {
  text: string;
  mood: Mood;
  /** True when the reply carried a recognised tag. */
  tagged: boolean;
};

const ANY_MOOD_TAG = /<mood:[^>]*>/g;
const MOOD_TAG_WORD = /<mood:([A-Z]+)>/g;

export const MOOD_ANIMATIONS: Record<Mood, AnimationKey> = {
  HAPPY: "happy",
  LAUGH: "laugh",
  WOW: "wow",
  SAD: "sad",
  THINK: "thinking"
};

export function isMood(v: string): v is Mood {
  return MOOD_TAGS.some((tag) => tag === v);
}

export function parseMoodReply(raw: string): ParsedReply {
  const source = String(raw ?? "");

  let last: string | null = null;
  for (const m of source.matchAll(MOOD_TAG_WORD)) last = m[1] ?? null;

  // Untagged text is returned as-is.
  const stripped = source.replace(ANY_MOOD_TAG, "");
  const text = stripped === source ? source : stripped.trim();
  if (last !== null && isMood(last)) return { text, mood: last, tagged: true };
  return { text, mood: DEFAULT_MOOD, tagged: false };
}

export function moodToAnimation(mood: Mood): AnimationKey {
  return MOOD_ANIMATIONS[mood];
}
