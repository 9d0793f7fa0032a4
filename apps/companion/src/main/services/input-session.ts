import type { BubbleId, BubbleManager, BubbleOwner } from "./bubble.service";

const OWNER_KEY = "input-session";

/** Tracks the one input bubble that collects a line of user text. */
export class InputSession implements BubbleOwner {
  #bubbles: BubbleManager;
  #current: BubbleId | null = null;
  #send: ((text: string) => void) | null = null;
  #onDismiss: (() => void) | null = null;
  #unregister: () => void;

  constructor(bubbles: BubbleManager) {
    this.#bubbles = bubbles;
    this.#unregister = bubbles.registerOwner(OWNER_KEY, this);
  }

  get isOpen() {
    return this.#current !== null;
  }

  get bubbleId() {
    return this.#current;
  }

  /**
   * Opens the input bubble. `send` receives trimmed, non-empty text; `onDismiss` fires when the
   * bubble goes away without sending anything.
   */
  open(send: (text: string) => void, onDismiss?: () => void): boolean {
    if (this.#current !== null) return false;

    const id = this.#bubbles.create({ kind: "input", onSubmit: (text) => this.#submit(text) }, OWNER_KEY);
    if (id === null) return false;

    this.#current = id;
    this.#send = send;
    this.#onDismiss = onDismiss ?? null;
    return true;
  }

  close() {
    const id = this.#current;
    if (id === null) return;
    this.#bubbles.close(id);
    // The owner callback normally clears us; make sure even if the bubble was already gone.
    this.#clear(true);
  }

  onBubbleClosed(id: BubbleId) {
    if (id !== this.#current) return;
    this.#clear(true);
  }

  dispose() {
    this.close();
    this.#unregister();
  }

  #submit(raw: string) {
    const id = this.#current;
    if (id === null) return;

    const text = String(raw ?? "").trim();
    const send = this.#send;
    if (text && send) {
      // Clear first so the bubble's own close notification does not count as a dismissal.
      this.#clear(false);
      try {
        send(text);
      } finally {
        this.#bubbles.close(id);
      }
      return;
    }

    this.#bubbles.close(id);
    this.#clear(true);
  }

  #clear(dismissed: boolean) {
    if (this.#current === null) return;
    const onDismiss = this.#onDismiss;
    this.#current = null;
    this.#onDismiss = null;
    this.#send = null;
    if (dismissed) onDismiss?.();
  }
}
