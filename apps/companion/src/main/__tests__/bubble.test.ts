import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AnimationKey } from "@deskdoge/shared";
import { NodeScheduler } from "../runtime/scheduler";
import { BubbleManager, placeBubble } from "../services/bubble.service";
import { FakeAnchor, FakeWindowHost } from "./fakes";

describe("placeBubble", () => {
  const anchor = { x: 500, y: 400, width: 100, height: 100 };

  it("centres chat bubbles above the anchor", () => {
    expect(placeBubble("chat", { width: 220, height: 100 }, anchor, 10)).toEqual({ x: 440, y: 290 });
  });

  it("puts price bubbles to the right, vertically centred", () => {
    expect(placeBubble("price", { width: 200, height: 60 }, anchor, 10)).toEqual({ x: 610, y: 420 });
  });
});

describe("BubbleManager", () => {
  let scheduler: NodeScheduler;
  let host: FakeWindowHost;
  let anchor: FakeAnchor;
  let states: AnimationKey[];
  let priceRequests: number;
  let bubbles: BubbleManager;

  beforeEach(() => {
    vi.useFakeTimers();
    scheduler = new NodeScheduler();
    host = new FakeWindowHost();
    anchor = new FakeAnchor();
    states = [];
    priceRequests = 0;
    bubbles = new BubbleManager({
      host,
      scheduler,
      getAnchor: () => anchor.getFrame(),
      animation: {
        setState: (k) => {
          states.push(k);
          return true;
        }
      },
      requestPrice: () => {
        priceRequests += 1;
      }
    });
  });

  afterEach(() => {
    scheduler.cancelAll();
    vi.useRealTimers();
  });

  it("opens windows at the computed position", () => {
    bubbles.create({ kind: "chat", text: "wow" });
    expect(host.last("chat").bounds).toEqual({ x: 440, y: 290, width: 220, height: 100 });
  });

  it("closes chat bubbles after 4 s and price bubbles after 3.5 s", () => {
    bubbles.create({ kind: "chat", text: "wow" });
    bubbles.create({ kind: "price", text: "$" });

    vi.advanceTimersByTime(3500);
    expect(host.last("price").destroyed).toBe(true);
    expect(host.last("chat").destroyed).toBe(false);

    vi.advanceTimersByTime(500);
    expect(host.last("chat").destroyed).toBe(true);
    expect(bubbles.size).toBe(0);
  });

  it("returns to idle and asks for a price after a chat bubble closes", () => {
    const id = bubbles.create({ kind: "chat", text: "wow" });
    expect(id).not.toBeNull();
    vi.advanceTimersByTime(4000);

    expect(states).toEqual(["idle"]);
    expect(priceRequests).toBe(1);
  });

  it("does not touch the animation when a price bubble closes", () => {
    bubbles.create({ kind: "price", text: "$" });
    vi.advanceTimersByTime(3500);
    expect(states).toEqual([]);
    expect(priceRequests).toBe(0);
  });

  it("suppresses a second live price or input bubble", () => {
    expect(bubbles.create({ kind: "price", text: "a" })).not.toBeNull();
    expect(bubbles.create({ kind: "price", text: "b" })).toBeNull();
    expect(bubbles.create({ kind: "input", onSubmit: () => {} })).not.toBeNull();
    expect(bubbles.create({ kind: "input", onSubmit: () => {} })).toBeNull();
    expect(host.windows).toHaveLength(2);
  });

  it("allows several chat bubbles at once", () => {
    bubbles.create({ kind: "chat", text: "a" });
    bubbles.create({ kind: "chat", text: "b" });
    expect(bubbles.count("chat")).toBe(2);
  });

  it("input bubbles never expire", () => {
    bubbles.create({ kind: "input", onSubmit: () => {} });
    vi.advanceTimersByTime(60 * 60 * 1000);
    expect(bubbles.hasLive("input")).toBe(true);
  });

  it("follows the anchor on reposition", () => {
    bubbles.create({ kind: "price", text: "$" });
    anchor.moveBy(30, -20);
    bubbles.reposition(anchor.getFrame());
    expect(host.last("price").moves).toEqual([{ x: 640, y: 400 }]);
  });

  it("rounds fractional positions", () => {
    bubbles.create({ kind: "chat", text: "x" });
    bubbles.reposition({ x: 0.4, y: 200.6, width: 101, height: 100 });
    expect(host.last("chat").moves).toEqual([{ x: -59, y: 91 }]);
  });

  it("evicts hidden, destroyed or unmovable windows and releases them", () => {
    const a = bubbles.create({ kind: "chat", text: "a" });
    const b = bubbles.create({ kind: "chat", text: "b" });
    const c = bubbles.create({ kind: "price", text: "c" });
    const [wa, wb] = host.ofKind("chat");
    if (!wa || !wb) throw new Error("expected two chat windows");
    wa.visible = false;
    wb.destroyed = true;
    host.last("price").failMoves = true;

    bubbles.reposition(anchor.getFrame());

    expect([a, b, c].map((id) => (id === null ? false : bubbles.has(id)))).toEqual([false, false, false]);
    expect(wa.destroyed).toBe(true);
    expect(host.last("price").destroyed).toBe(true);
    expect(host.open("chat")).toEqual([]);
    expect(host.open("price")).toEqual([]);
    // Eviction is not a close: no chat coupling.
    expect(states).toEqual([]);
    vi.advanceTimersByTime(10_000);
    expect(priceRequests).toBe(0);
  });

  it("tells the owner when its bubble goes away", () => {
    const closed: number[] = [];
    bubbles.registerOwner("me", { onBubbleClosed: (id) => closed.push(id) });
    const id = bubbles.create({ kind: "input", onSubmit: () => {} }, "me");
    host.last("input").visible = false;
    bubbles.reposition(anchor.getFrame());
    expect(closed).toEqual([id]);
  });

  it("closeAll closes everything without the chat side effects", () => {
    bubbles.create({ kind: "chat", text: "a" });
    bubbles.create({ kind: "price", text: "b" });
    bubbles.closeAll();
    expect(host.windows.every((w) => w.destroyed)).toBe(true);
    expect(states).toEqual([]);
    vi.advanceTimersByTime(10_000);
    expect(priceRequests).toBe(0);
  });
});
