import { CHAT_HISTORY_MAX } from "@deskdoge/shared";
import type { ChatMessage } from "@deskdoge/shared";

/**
 * Bounded, ordered chat history. Oldest entries are dropped first once the cap is reached.
 *
 * Only the UI-owning context appends; background work reads a snapshot from `window()`.
 */
export class ConversationHistory {
  readonly max: number;
  #entries: ChatMessage[] = [];

  constructor(max: number = CHAT_HISTORY_MAX) {
    const n = Math.floor(Number(max));
    if (!Number.isFinite(n) || n < 1) throw new Error(`history cap must be a positive integer, got ${max}`);
    this.max = n;
  }

  get length() {
    return this.#entries.length;
  }

  append(msg: ChatMessage) {
    this.#entries.push({ role: msg.role, content: msg.content });
    if (this.#entries.length > this.max) this.#entries = this.#entries.slice(-this.max);
  }

  /** Copy of the most recent `n` entries (at most the cap). */
  window(n: number = this.max): ChatMessage[] {
    const k = Math.max(0, Math.min(this.max, Math.floor(n)));
    if (k === 0) return [];
    return this.#entries.slice(-k).map((m) => ({ ...m }));
  }

  clear() {
    this.#entries = [];
  }
}
