import { BUBBLE_GAP_PX, BUBBLE_SIZES, BUBBLE_TTL_MS } from "@deskdoge/shared";
import type { AnimationKey, BubbleKind, Point, Rect, Size } from "@deskdoge/shared";
import type { BubbleSizes, BubbleWindowSpec, OverlayWindow, WindowHost } from "../protocol/types";
import type { Scheduler, TimerHandle } from "../runtime/scheduler";

export type BubbleId = number;

export type BubblePayload = BubbleWindowSpec;

/** Something that wants to hear when a bubble it opened goes away. */
export interface BubbleOwner {
  onBubbleClosed(id: BubbleId): void;
}

type BubbleRecord = {
  id: BubbleId;
  kind: BubbleKind;
  size: Size;
  window: OverlayWindow;
  ownerKey: string | null;
  ttl: TimerHandle | null;
};

/** Chat and input bubbles sit centred above the anchor; price bubbles to its right. */
export function placeBubble(kind: BubbleKind, size: Size, anchor: Rect, gap: number = BUBBLE_GAP_PX): Point {
  if (kind === "price") {
    return {
      x: anchor.x + anchor.width + gap,
      y: anchor.y + (anchor.height - size.height) / 2
    };
  }
  return {
    x: anchor.x + (anchor.width - size.width) / 2,
    y: anchor.y - size.height - gap
  };
}

export class BubbleManager {
  #host: WindowHost;
  #scheduler: Scheduler;
  #getAnchor: () => Rect;
  #animation: { setState(key: AnimationKey): boolean };
  #requestPrice: () => void;
  #sizes: BubbleSizes;
  #gap: number;
  #ttl: Record<BubbleKind, number | null>;

  #nextId = 1;
  #bubbles = new Map<BubbleId, BubbleRecord>();
  #owners = new Map<string, BubbleOwner>();

  constructor(opts: {
    host: WindowHost;
    scheduler: Scheduler;
    getAnchor: () => Rect;
    animation: { setState(key: AnimationKey): boolean };
    /** Called after a chat bubble closes so the idle price cadence resumes. */
    requestPrice: () => void;
    sizes?: Partial<BubbleSizes>;
    gap?: number;
    ttlMs?: Partial<Record<BubbleKind, number | null>>;
  }) {
    this.#host = opts.host;
    this.#scheduler = opts.scheduler;
    this.#getAnchor = opts.getAnchor;
    this.#animation = opts.animation;
    this.#requestPrice = opts.requestPrice;
    this.#sizes = { ...BUBBLE_SIZES, ...(opts.sizes ?? {}) };
    this.#gap = opts.gap ?? BUBBLE_GAP_PX;
    this.#ttl = { ...BUBBLE_TTL_MS, ...(opts.ttlMs ?? {}) };
  }

  get size() {
    return this.#bubbles.size;
  }

  registerOwner(key: string, owner: BubbleOwner) {
    this.#owners.set(key, owner);
    return () => {
      if (this.#owners.get(key) === owner) this.#owners.delete(key);
    };
  }

  has(id: BubbleId) {
    return this.#bubbles.has(id);
  }

  kindOf(id: BubbleId): BubbleKind | null {
    return this.#bubbles.get(id)?.kind ?? null;
  }

  count(kind: BubbleKind) {
    let n = 0;
    for (const b of this.#bubbles.values()) if (b.kind === kind) n++;
    return n;
  }

  hasLive(kind: BubbleKind) {
    for (const b of this.#bubbles.values()) {
      if (b.kind === kind && !b.window.isDestroyed() && b.window.isVisible()) return true;
    }
    return false;
  }

  /** Returns the new bubble id, or null when a duplicate was suppressed. */
  create(payload: BubblePayload, ownerKey: string | null = null): BubbleId | null {
    const kind = payload.kind;
    if ((kind === "price" || kind === "input") && this.hasLive(kind)) return null;

    const size = this.#sizes[kind];
    const at = placeBubble(kind, size, this.#getAnchor(), this.#gap);
    const window = this.#host.createBubbleWindow(payload, { ...at, ...size });

    const id = this.#nextId++;
    const record: BubbleRecord = { id, kind, size, window, ownerKey, ttl: null };
    this.#bubbles.set(id, record);

    const ttl = this.#ttl[kind];
    if (ttl !== null) record.ttl = this.#scheduler.schedule(ttl, false, () => this.close(id));
    return id;
  }

  reposition(anchor: Rect) {
    for (const b of [...this.#bubbles.values()]) {
      if (b.window.isDestroyed() || !b.window.isVisible()) {
        this.#evict(b);
        continue;
      }
      const at = placeBubble(b.kind, b.size, anchor, this.#gap);
      try {
        b.window.setPosition(Math.round(at.x), Math.round(at.y));
      } catch (err) {
        console.warn(`[bubbles] dropping ${b.kind} bubble #${b.id}, move failed:`, err);
        this.#evict(b);
      }
    }
  }

  close(id: BubbleId) {
    const b = this.#bubbles.get(id);
    if (!b) return false;

    this.#detach(b);
    this.#release(b);

    if (b.kind === "chat") {
      // A finished reply hands the stage back to the idle loop and the price ticker.
      this.#animation.setState("idle");
      this.#requestPrice();
    }
    return true;
  }

  closeAll() {
    for (const id of [...this.#bubbles.keys()]) {
      const b = this.#bubbles.get(id);
      if (!b) continue;
      this.#detach(b);
      this.#release(b);
    }
  }

  /** Drops a bubble whose window is gone or stuck. Not a close: no chat coupling. */
  #evict(b: BubbleRecord) {
    console.debug(`[bubbles] evicting ${b.kind} bubble #${b.id}`);
    this.#detach(b);
    this.#release(b);
  }

  #release(b: BubbleRecord) {
    try {
      if (!b.window.isDestroyed()) b.window.close();
    } catch (err) {
      console.warn(`[bubbles] close failed for ${b.kind} bubble #${b.id}:`, err);
    }
  }

  #detach(b: BubbleRecord) {
    b.ttl?.cancel();
    b.ttl = null;
    this.#bubbles.delete(b.id);

    const key = b.ownerKey;
    b.ownerKey = null;
    if (key === null) return;
    const owner = this.#owners.get(key);
    owner?.onBubbleClosed(b.id);
  }
}
