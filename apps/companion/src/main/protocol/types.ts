import type { AnimationKey, BubbleKind, CompletionMessage, Point, PriceQuote, Rect, Size } from "@deskdoge/shared";

/** A decoded animation frame. Decoding itself happens in the window layer; the core only sequences frames. */
export type FrameImage = {
  key: AnimationKey;
  index: number;
  source: string;
};

export interface AssetSource {
  /** Ordered frames for `key`, or null when the asset is unavailable. Must not throw. */
  load(key: AnimationKey): readonly FrameImage[] | null;
}

export interface MarketDataSource {
  fetch(assetId: string): Promise<PriceQuote>;
}

export interface SearchSource {
  /** Short factual snippet, or "" on any failure. */
  query(text: string): Promise<string>;
}

export interface CompletionSource {
  complete(model: string, messages: CompletionMessage[]): Promise<string>;
}

export interface CredentialPrompt {
  /** Resolves with the entered secret, or null when the user dismissed the prompt. */
  requestSecret(): Promise<string | null>;
}

export interface OverlayWindow {
  isVisible(): boolean;
  isDestroyed(): boolean;
  setPosition(x: number, y: number): void;
  close(): void;
}

export type BubbleWindowSpec =
  | { kind: "chat"; text: string }
  | { kind: "price"; text: string }
  | { kind: "input"; onSubmit: (text: string) => void };

export type MenuItem = { label: string; click: () => void };

export interface WindowHost {
  createBubbleWindow(spec: BubbleWindowSpec, bounds: Rect): OverlayWindow;
  popupMenu(items: MenuItem[], at: Point): void;
}

/** The draggable mascot window every bubble is laid out against. */
export interface AnchorWindow {
  getFrame(): Rect;
  moveBy(dx: number, dy: number): void;
  showFrame(frame: FrameImage): void;
}

export type BubbleSizes = Record<BubbleKind, Size>;

export type PersonaConfig = {
  name: string;
  maxWords: number;
};

export type LLMConfig = {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
};

export type PriceConfig = {
  assetId: string;
  label: string;
  vsCurrency: string;
  baseUrl: string;
  ttlMs: number;
  timeoutMs: number;
  firstShowDelayMs: number;
  intervalMs: number;
  unavailableText: string;
};

export type SearchConfig = {
  enabled: boolean;
  baseUrl: string;
  appName: string;
  timeoutMs: number;
  maxChars: number;
};

export type ChatConfig = {
  historyMax: number;
  failureText: string;
};

export type AnimationConfig = {
  frameIntervalMs: number;
  revertMs: number;
};

export type BubblesConfig = {
  gap: number;
  chatTtlMs: number;
  priceTtlMs: number;
  sizes: BubbleSizes;
};

export type AppConfig = {
  persona: PersonaConfig;
  llm: LLMConfig;
  price: PriceConfig;
  search: SearchConfig;
  chat: ChatConfig;
  animation: AnimationConfig;
  bubbles: BubblesConfig;
  window: Rect;
  credential: { path: string };
  assets: { dir: string; animations: Record<AnimationKey, string> };
};
