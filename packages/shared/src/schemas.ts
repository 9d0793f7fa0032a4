import { z } from "zod";
import { MOOD_TAGS } from "./constants";

const finite = z.number().finite();

export const PointerEventSchema = z.discriminatedUnion("event", [
  z.object({
    type: z.literal("POINTER"),
    ts: z.number(),
    event: z.literal("PRESS"),
    x: finite,
    y: finite
  }),
  z.object({
    type: z.literal("POINTER"),
    ts: z.number(),
    event: z.literal("DRAG"),
    dx: finite,
    dy: finite
  }),
  z.object({
    type: z.literal("POINTER"),
    ts: z.number(),
    event: z.literal("RELEASE"),
    clickCount: z.number().int().min(0)
  }),
  z.object({
    type: z.literal("POINTER"),
    ts: z.number(),
    event: z.literal("DOUBLE_CLICK")
  }),
  z.object({
    type: z.literal("POINTER"),
    ts: z.number(),
    event: z.literal("RIGHT_CLICK"),
    x: finite,
    y: finite
  })
]);

export const MoodSchema = z.enum(MOOD_TAGS);

export const CompletionEventSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("REPLY"),
    payload: z.object({
      text: z.string(),
      mood: MoodSchema,
      raw: z.string()
    })
  }),
  z.object({
    kind: z.literal("FAILURE"),
    payload: z.object({
      error: z.literal("CompletionFailure"),
      message: z.string()
    })
  })
]);
