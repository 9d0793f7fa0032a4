import { describe, expect, it } from "vitest";
import { CompletionEventSchema, PointerEventSchema } from "../schemas";

describe("PointerEventSchema", () => {
  it("accepts each pointer event shape", () => {
    for (const e of [
      { type: "POINTER", ts: 1, event: "PRESS", x: 1, y: 2 },
      { type: "POINTER", ts: 1, event: "DRAG", dx: -4, dy: 0 },
      { type: "POINTER", ts: 1, event: "RELEASE", clickCount: 1 },
      { type: "POINTER", ts: 1, event: "DOUBLE_CLICK" },
      { type: "POINTER", ts: 1, event: "RIGHT_CLICK", x: 0, y: 0 }
    ]) {
      expect(PointerEventSchema.safeParse(e).success).toBe(true);
    }
  });

  it("rejects non-finite deltas and unknown events", () => {
    expect(PointerEventSchema.safeParse({ type: "POINTER", ts: 1, event: "DRAG", dx: Infinity, dy: 0 }).success).toBe(
      false
    );
    expect(PointerEventSchema.safeParse({ type: "POINTER", ts: 1, event: "SCROLL" }).success).toBe(false);
  });
});

describe("CompletionEventSchema", () => {
  it("only admits known moods", () => {
    const reply = (mood: string) => ({ kind: "REPLY", payload: { text: "hi", mood, raw: "hi" } });
    expect(CompletionEventSchema.safeParse(reply("THINK")).success).toBe(true);
    expect(CompletionEventSchema.safeParse(reply("ANGRY")).success).toBe(false);
  });
});
