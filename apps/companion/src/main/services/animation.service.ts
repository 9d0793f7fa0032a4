import { ANIMATION_TIMING, PERSISTENT_ANIMATIONS } from "@deskdoge/shared";
import type { AnimationChange, AnimationKey } from "@deskdoge/shared";
import type { AssetSource, FrameImage } from "../protocol/types";
import type { Scheduler, TimerHandle } from "../runtime/scheduler";

export function isTransient(key: AnimationKey) {
  return !PERSISTENT_ANIMATIONS.includes(key);
}

export class AnimationController {
  #assets: AssetSource;
  #scheduler: Scheduler;
  #onFrame: (frame: FrameImage) => void;
  #onHeartbeat: () => void;
  #onChange: (c: AnimationChange) => void;
  #revertMs: number;
  #frameIntervalMs: number;

  #state: AnimationKey = "idle";
  #frames: readonly FrameImage[] = [];
  #frameIdx = 0;
  #generation = 0;
  #revert: TimerHandle | null = null;
  #ticker: TimerHandle | null = null;

  constructor(opts: {
    assets: AssetSource;
    scheduler: Scheduler;
    /** Receives every frame to display. */
    onFrame?: (frame: FrameImage) => void;
    /**
     * Runs after each frame advance. The anchor window can be dragged at any moment and
     * there is no move hook that fires often enough, so this tick is also the layout clock.
     */
    onHeartbeat?: () => void;
    onChange?: (c: AnimationChange) => void;
    revertMs?: number;
    frameIntervalMs?: number;
  }) {
    this.#assets = opts.assets;
    this.#scheduler = opts.scheduler;
    this.#onFrame = opts.onFrame ?? (() => {});
    this.#onHeartbeat = opts.onHeartbeat ?? (() => {});
    this.#onChange = opts.onChange ?? (() => {});
    this.#revertMs = Math.max(0, Number(opts.revertMs ?? ANIMATION_TIMING.revertMs));
    this.#frameIntervalMs = Math.max(1, Number(opts.frameIntervalMs ?? ANIMATION_TIMING.frameIntervalMs));
  }

  get state() {
    return this.#state;
  }

  get frameIndex() {
    return this.#frameIdx;
  }

  get frameCount() {
    return this.#frames.length;
  }

  get currentFrame(): FrameImage | null {
    return this.#frames[this.#frameIdx] ?? null;
  }

  get generation() {
    return this.#generation;
  }

  get hasPendingRevert() {
    return this.#revert?.active ?? false;
  }

  get running() {
    return this.#ticker !== null;
  }

  /** Returns false (and changes nothing) when the asset for `key` cannot be loaded. */
  setState(key: AnimationKey): boolean {
    let frames: readonly FrameImage[] | null = null;
    try {
      frames = this.#assets.load(key);
    } catch (err) {
      console.warn(`[animation] asset load failed for ${key}:`, err);
      frames = null;
    }
    if (!frames || frames.length === 0) {
      console.warn(`[animation] asset missing for ${key}, keeping ${this.#state}`);
      return false;
    }

    const from = this.#state;
    this.#revert?.cancel();
    this.#revert = null;
    const generation = ++this.#generation;

    this.#state = key;
    this.#frames = frames;
    this.#frameIdx = 0;
    this.#render();

    if (isTransient(key)) {
      this.#revert = this.#scheduler.schedule(this.#revertMs, false, () => {
        // A newer transition owns the animation now.
        if (generation !== this.#generation) return;
        this.#revert = null;
        this.setState("idle");
      });
    }

    this.#onChange({ type: "ANIMATION_CHANGE", ts: this.#scheduler.now(), from, to: key, generation });
    return true;
  }

  tick() {
    if (this.#frames.length > 0) {
      this.#frameIdx = (this.#frameIdx + 1) % this.#frames.length;
      this.#render();
    }
    this.#onHeartbeat();
  }

  start() {
    if (this.#ticker) return;
    this.#ticker = this.#scheduler.schedule(this.#frameIntervalMs, true, () => this.tick());
  }

  stop() {
    this.#ticker?.cancel();
    this.#ticker = null;
    this.#revert?.cancel();
    this.#revert = null;
  }

  #render() {
    const frame = this.#frames[this.#frameIdx];
    if (frame) this.#onFrame(frame);
  }
}
