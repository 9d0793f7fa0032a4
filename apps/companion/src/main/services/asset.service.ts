import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import type { AnimationKey } from "@deskdoge/shared";
import type { AssetSource, FrameImage } from "../protocol/types";

const FRAME_FILE = /\.(png|gif|webp)$/i;

export const DEFAULT_ANIMATION_DIRS: Record<AnimationKey, string> = {
  idle: "idle",
  happy: "happy",
  laugh: "laugh",
  wow: "wow",
  sad: "sad",
  thinking: "thinking"
};

/**
 * Frames are the image files of `<root>/<dir>`, in file-name order.
 * Results are memoised per key, misses included, so the tick never hits the disk twice.
 */
export class FsAssetSource implements AssetSource {
  #root: string;
  #dirs: Record<AnimationKey, string>;
  #cache = new Map<AnimationKey, readonly FrameImage[] | null>();

  constructor(root: string, dirs: Record<AnimationKey, string> = DEFAULT_ANIMATION_DIRS) {
    this.#root = root;
    this.#dirs = dirs;
  }

  load(key: AnimationKey): readonly FrameImage[] | null {
    if (this.#cache.has(key)) return this.#cache.get(key) ?? null;

    const dir = join(this.#root, this.#dirs[key]);
    let frames: FrameImage[] | null = null;
    try {
      if (existsSync(dir)) {
        const files = readdirSync(dir)
          .filter((f) => FRAME_FILE.test(f) && !f.startsWith("."))
          .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));
        frames = files.map((f, index) => ({ key, index, source: join(dir, f) }));
      }
    } catch (err) {
      console.warn(`[assets] failed to list ${dir}:`, err);
      frames = null;
    }

    const result = frames && frames.length > 0 ? frames : null;
    this.#cache.set(key, result);
    return result;
  }
}
