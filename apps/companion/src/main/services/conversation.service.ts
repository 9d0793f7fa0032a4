import { CompletionEventSchema } from "@deskdoge/shared";
import type { AnimationKey, ChatMessage, CompletionEvent, ConversationPhase, InitiateOutcome } from "@deskdoge/shared";
import { hasPriceIntent } from "../agent/price-intent";
import type { PriceIntentRules } from "../agent/price-intent";
import { moodToAnimation, parseMoodReply } from "../agent/mood-parser";
import { buildCompletionMessages } from "../agent/prompts";
import type { ConversationHistory } from "../agent/history";
import type { MainBus } from "../protocol/bus";
import type { CompletionSource, CredentialPrompt, PersonaConfig, SearchSource } from "../protocol/types";
import type { Scheduler } from "../runtime/scheduler";
import type { SingleFlightLock } from "../runtime/single-flight";
import type { BubbleManager } from "./bubble.service";
import type { CredentialService } from "./credential.service";
import type { InputSession } from "./input-session";
import type { PriceCache } from "./price-cache.service";

type Enrichment = {
  searchSnippet: string;
  priceSnippet: string;
  priceIntent: boolean;
};

export type ConversationDeps = {
  bus: MainBus;
  scheduler: Scheduler;
  lock: SingleFlightLock;
  history: ConversationHistory;
  credentials: CredentialService;
  credentialPrompt: CredentialPrompt;
  input: InputSession;
  bubbles: BubbleManager;
  animation: { setState(key: AnimationKey): boolean };
  priceCache: PriceCache;
  search: SearchSource;
  completion: CompletionSource;
  persona: PersonaConfig;
  model: string;
  priceIntent?: PriceIntentRules;
  failureText?: string;
};

/**
 * One conversation attempt at a time:
 * idle → credential-check → input-open → dispatched → rendering → idle.
 *
 * The single-flight lock is taken when the input bubble opens and released only after the
 * reply has been rendered (or the attempt was abandoned), so the busy window covers the
 * whole request-and-render cycle.
 */
export class ConversationPipeline {
  #d: ConversationDeps;
  #phase: ConversationPhase = "idle";
  #unsubscribe: () => void;

  constructor(deps: ConversationDeps) {
    this.#d = deps;
    this.#unsubscribe = deps.bus.onCompletion((e) => this.#render(e));
  }

  get phase() {
    return this.#phase;
  }

  get busy() {
    return this.#d.lock.held;
  }

  async initiate(): Promise<InitiateOutcome> {
    const d = this.#d;

    if (this.#phase === "credential-check") {
      console.debug("[conversation] credential prompt already open, dropping request");
      return { ok: false, reason: "ConcurrentRequestRejected" };
    }

    if (!d.credentials.has()) {
      this.#phase = "credential-check";
      let ok = false;
      try {
        ok = await d.credentials.ensure(d.credentialPrompt);
      } catch (err) {
        console.warn("[conversation] credential prompt failed:", err);
        ok = false;
      } finally {
        this.#phase = "idle";
      }
      if (!ok) {
        console.log("[conversation] credential prompt dismissed");
        return { ok: false, reason: "UserCancelled" };
      }
    }

    if (!d.lock.tryAcquire()) {
      console.debug("[conversation] busy, dropping request");
      return { ok: false, reason: "ConcurrentRequestRejected" };
    }

    const opened = d.input.open(
      (text) => this.#submit(text),
      () => this.#abandon("input dismissed")
    );
    if (!opened) {
      d.lock.release();
      this.#phase = "idle";
      return { ok: false, reason: "ConcurrentRequestRejected" };
    }

    this.#phase = "input-open";
    return { ok: true };
  }

  /** Anything that does not match the completion contract is rendered as a failure. */
  #checked(raw: unknown): CompletionEvent {
    const parsed = CompletionEventSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    console.error("[conversation] malformed completion event:", parsed.error.issues[0]?.message);
    return { kind: "FAILURE", payload: { error: "CompletionFailure", message: "malformed completion event" } };
  }

  dispose() {
    this.#unsubscribe();
  }

  #submit(text: string) {
    const d = this.#d;
    d.history.append({ role: "user", content: text });
    d.animation.setState("thinking");
    this.#phase = "dispatched";
    console.log(`[conversation] dispatch textLen=${text.length}`);

    // Snapshot taken on the UI side; the background unit never touches shared state.
    const history = d.history.window();
    void this.#runTurn(text, history).then((event) => {
      d.scheduler.post(() => d.bus.emitCompletion(event));
    });
  }

  async #runTurn(text: string, history: ChatMessage[]): Promise<CompletionEvent> {
    const d = this.#d;
    try {
      const enrichment = await this.#enrich(text);
      const messages = buildCompletionMessages({ persona: d.persona, history, ...enrichment });
      const raw = await d.completion.complete(d.model, messages);
      const parsed = parseMoodReply(raw);
      console.log(`[conversation] reply mood=${parsed.mood} tagged=${parsed.tagged} len=${parsed.text.length}`);
      return { kind: "REPLY", payload: { text: parsed.text, mood: parsed.mood, raw } };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error("[conversation] completion failed:", message);
      return { kind: "FAILURE", payload: { error: "CompletionFailure", message } };
    }
  }

  async #enrich(text: string): Promise<Enrichment> {
    const d = this.#d;
    const priceIntent = hasPriceIntent(text, d.priceIntent);

    const search = Promise.resolve()
      .then(() => d.search.query(text))
      .catch((err: unknown) => {
        console.warn("[conversation] search unavailable:", err);
        return "";
      });
    const price = priceIntent
      ? d.priceCache.get(false).catch((err: unknown) => {
          console.warn("[conversation] price unavailable:", err);
          return "";
        })
      : Promise.resolve(d.priceCache.peekFresh());

    const [searchSnippet, priceSnippet] = await Promise.all([search, price]);
    return { searchSnippet, priceSnippet, priceIntent };
  }

  #render(raw: CompletionEvent) {
    const d = this.#d;
    this.#phase = "rendering";
    try {
      const event = this.#checked(raw);
      if (event.kind === "REPLY") {
        const { text, mood } = event.payload;
        d.history.append({ role: "assistant", content: text });
        d.bubbles.create({ kind: "chat", text });
        d.animation.setState(moodToAnimation(mood));
      } else {
        d.bubbles.create({ kind: "chat", text: d.failureText ?? "Much error. Try again later." });
        d.animation.setState("idle");
      }
    } catch (err) {
      console.error("[conversation] render failed:", err);
    } finally {
      this.#phase = "idle";
      d.lock.release();
    }
  }

  #abandon(reason: string) {
    if (this.#phase !== "input-open") return;
    console.log(`[conversation] ${reason}, releasing`);
    this.#phase = "idle";
    this.#d.lock.release();
  }
}
