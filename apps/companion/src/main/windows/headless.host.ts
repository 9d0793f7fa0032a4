import type { Point, Rect } from "@deskdoge/shared";
import type { AnchorWindow, BubbleWindowSpec, FrameImage, MenuItem, OverlayWindow, WindowHost } from "../protocol/types";

export class HeadlessBubbleWindow implements OverlayWindow {
  readonly spec: BubbleWindowSpec;
  #bounds: Rect;
  #visible = true;
  #destroyed = false;
  #onClose: () => void;

  constructor(spec: BubbleWindowSpec, bounds: Rect, onClose: () => void = () => {}) {
    this.spec = spec;
    this.#bounds = { ...bounds };
    this.#onClose = onClose;
  }

  get bounds(): Rect {
    return { ...this.#bounds };
  }

  isVisible() {
    return this.#visible && !this.#destroyed;
  }

  isDestroyed() {
    return this.#destroyed;
  }

  setPosition(x: number, y: number) {
    if (this.#destroyed) throw new Error("window destroyed");
    this.#bounds = { ...this.#bounds, x, y };
  }

  /** The user clicked the bubble away; the owner only learns about it on the next layout pass. */
  hide() {
    this.#visible = false;
  }

  close() {
    if (this.#destroyed) return;
    this.#destroyed = true;
    this.#visible = false;
    this.#onClose();
    console.log(`[window] ${this.spec.kind} bubble closed`);
  }
}

/** Renders bubbles and menus as console lines. */
export class HeadlessWindowHost implements WindowHost {
  #windows = new Set<HeadlessBubbleWindow>();
  #menu: MenuItem[] = [];

  createBubbleWindow(spec: BubbleWindowSpec, bounds: Rect): HeadlessBubbleWindow {
    const win = new HeadlessBubbleWindow(spec, bounds, () => this.#windows.delete(win));
    this.#windows.add(win);
    const at = `@${Math.round(bounds.x)},${Math.round(bounds.y)}`;
    if (spec.kind === "input") console.log(`[window] input bubble ${at}: type a message, or "esc" to dismiss`);
    else console.log(`[window] ${spec.kind} bubble ${at}: ${spec.text}`);
    return win;
  }

  popupMenu(items: MenuItem[], at: Point) {
    this.#menu = [...items];
    console.log(`[window] menu @${at.x},${at.y}`);
    items.forEach((item, i) => console.log(`  ${i + 1}. ${item.label}`));
  }

  /** Windows created and not yet closed, hidden ones included. */
  get openWindows() {
    return this.#windows.size;
  }

  /** The open input bubble, if any. */
  get input(): HeadlessBubbleWindow | null {
    for (const w of this.#windows) {
      if (w.spec.kind === "input" && w.isVisible()) return w;
    }
    return null;
  }

  submitInput(text: string) {
    const win = this.input;
    if (!win || win.spec.kind !== "input") return false;
    win.spec.onSubmit(text);
    return true;
  }

  dismissInput() {
    const win = this.input;
    if (!win) return false;
    win.hide();
    return true;
  }

  /** 1-based, as printed. */
  chooseMenu(position: number) {
    const item = this.#menu[position - 1];
    this.#menu = [];
    if (!item) return false;
    item.click();
    return true;
  }
}

export class HeadlessAnchorWindow implements AnchorWindow {
  #frame: Rect;
  #lastKey: string | null = null;

  constructor(frame: Rect) {
    this.#frame = { ...frame };
  }

  getFrame(): Rect {
    return { ...this.#frame };
  }

  moveBy(dx: number, dy: number) {
    this.#frame = { ...this.#frame, x: this.#frame.x + dx, y: this.#frame.y + dy };
  }

  showFrame(frame: FrameImage) {
    if (frame.key === this.#lastKey) return;
    this.#lastKey = frame.key;
    console.log(`[window] mascot shows ${frame.key}`);
  }
}
