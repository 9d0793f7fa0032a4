import { PointerEventSchema } from "@deskdoge/shared";
import type { InitiateOutcome, PointerEvent } from "@deskdoge/shared";
import { ConversationHistory } from "./agent/history";
import { MainBus } from "./protocol/bus";
import type {
  AnchorWindow,
  AppConfig,
  AssetSource,
  CompletionSource,
  CredentialPrompt,
  MarketDataSource,
  SearchSource,
  WindowHost
} from "./protocol/types";
import type { Scheduler, TimerHandle } from "./runtime/scheduler";
import { SingleFlightLock } from "./runtime/single-flight";
import { AnimationController } from "./services/animation.service";
import { BubbleManager } from "./services/bubble.service";
import { ConversationPipeline } from "./services/conversation.service";
import type { CredentialService } from "./services/credential.service";
import { InputSession } from "./services/input-session";
import { PriceCache } from "./services/price-cache.service";

/** Everything the runtime owns. Created once, mutated only from the UI-owning context. */
export type AppContext = {
  config: AppConfig;
  bus: MainBus;
  scheduler: Scheduler;
  anchor: AnchorWindow;
  lock: SingleFlightLock;
  history: ConversationHistory;
  animation: AnimationController;
  bubbles: BubbleManager;
  input: InputSession;
  priceCache: PriceCache;
  credentials: CredentialService;
  conversation: ConversationPipeline;
};

export type OrchestratorDeps = {
  config: AppConfig;
  scheduler: Scheduler;
  host: WindowHost;
  anchor: AnchorWindow;
  assets: AssetSource;
  market: MarketDataSource;
  search: SearchSource;
  completion: CompletionSource;
  credentials: CredentialService;
  credentialPrompt: CredentialPrompt;
  bus?: MainBus;
  /** Called after "Exit" has stopped the runtime. */
  onExit?: () => void;
};

export class Orchestrator {
  readonly ctx: AppContext;
  #host: WindowHost;
  #onExit: () => void;
  #timers: TimerHandle[] = [];
  #unsubscribe: (() => void) | null = null;
  #stopped = false;
  #pressed = false;
  #dragged = false;

  constructor(deps: OrchestratorDeps) {
    const { config, scheduler, anchor } = deps;
    const bus = deps.bus ?? new MainBus();
    this.#host = deps.host;
    this.#onExit = deps.onExit ?? (() => {});

    const animation = new AnimationController({
      assets: deps.assets,
      scheduler,
      revertMs: config.animation.revertMs,
      frameIntervalMs: config.animation.frameIntervalMs,
      onFrame: (frame) => anchor.showFrame(frame),
      onHeartbeat: () => bubbles.reposition(anchor.getFrame()),
      onChange: (c) => bus.emitAnimation(c)
    });

    const bubbles = new BubbleManager({
      host: deps.host,
      scheduler,
      getAnchor: () => anchor.getFrame(),
      animation,
      requestPrice: () => void this.showPrice(),
      sizes: config.bubbles.sizes,
      gap: config.bubbles.gap,
      ttlMs: { chat: config.bubbles.chatTtlMs, price: config.bubbles.priceTtlMs, input: null }
    });

    const priceCache = new PriceCache({
      market: deps.market,
      now: () => scheduler.now(),
      assetId: config.price.assetId,
      label: config.price.label,
      ttlMs: config.price.ttlMs
    });

    const lock = new SingleFlightLock();
    const history = new ConversationHistory(config.chat.historyMax);
    const input = new InputSession(bubbles);

    const conversation = new ConversationPipeline({
      bus,
      scheduler,
      lock,
      history,
      credentials: deps.credentials,
      credentialPrompt: deps.credentialPrompt,
      input,
      bubbles,
      animation,
      priceCache,
      search: deps.search,
      completion: deps.completion,
      persona: config.persona,
      model: config.llm.model,
      failureText: config.chat.failureText
    });

    this.ctx = {
      config,
      bus,
      scheduler,
      anchor,
      lock,
      history,
      animation,
      bubbles,
      input,
      priceCache,
      credentials: deps.credentials,
      conversation
    };
  }

  get running() {
    return this.#unsubscribe !== null;
  }

  start() {
    if (this.#unsubscribe || this.#stopped) return;
    const { animation, bus, scheduler, config } = this.ctx;

    if (!animation.setState("idle")) console.warn("[app] idle animation missing, mascot will not render");
    animation.start();
    this.#unsubscribe = bus.onPointer((e) => this.handlePointer(e));

    this.#timers.push(scheduler.schedule(config.price.firstShowDelayMs, false, () => void this.showPrice()));
    this.#timers.push(scheduler.schedule(config.price.intervalMs, true, () => void this.showPrice()));
    console.log("[app] started. Drag = move, click = price, double-click = chat, right-click = menu");
  }

  /** Final: the bus subscriptions and the input owner are torn down. */
  stop() {
    this.#stopped = true;
    for (const t of this.#timers) t.cancel();
    this.#timers = [];
    this.#unsubscribe?.();
    this.#unsubscribe = null;

    const { animation, bubbles, input, conversation } = this.ctx;
    animation.stop();
    input.dispose();
    bubbles.closeAll();
    conversation.dispose();
  }

  /** Validates an event from the window layer and routes it through the bus. */
  dispatch(raw: unknown) {
    const parsed = PointerEventSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn("[app] ignoring malformed pointer event:", parsed.error.issues[0]?.message);
      return false;
    }
    this.ctx.bus.emitPointer(parsed.data);
    return true;
  }

  handlePointer(e: PointerEvent) {
    const { anchor, bubbles } = this.ctx;
    switch (e.event) {
      case "PRESS":
        this.#pressed = true;
        this.#dragged = false;
        return;
      case "DRAG":
        anchor.moveBy(e.dx, e.dy);
        this.#dragged = true;
        bubbles.reposition(anchor.getFrame());
        return;
      case "RELEASE": {
        // A press that never moved is a single click.
        const click = this.#pressed && !this.#dragged && e.clickCount === 1;
        this.#pressed = false;
        this.#dragged = false;
        if (click) void this.showPrice();
        return;
      }
      case "DOUBLE_CLICK":
        void this.openChat();
        return;
      case "RIGHT_CLICK":
        this.#host.popupMenu([{ label: "Exit", click: () => this.exit() }], { x: e.x, y: e.y });
        return;
    }
  }

  async openChat(): Promise<InitiateOutcome> {
    const outcome = await this.ctx.conversation.initiate();
    if (!outcome.ok) console.debug(`[app] chat not opened: ${outcome.reason}`);
    return outcome;
  }

  async showPrice() {
    const { bubbles, priceCache, scheduler, config } = this.ctx;
    if (bubbles.hasLive("price")) return;

    const snippet = await priceCache.get(false);
    scheduler.post(() => {
      if (this.#stopped) return;
      bubbles.create({ kind: "price", text: snippet || config.price.unavailableText });
    });
  }

  exit() {
    if (this.#stopped) return;
    console.log("[app] exit requested");
    this.stop();
    this.#onExit();
  }
}
