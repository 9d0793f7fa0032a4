import { EventEmitter } from "node:events";
import { BUS_CHANNELS } from "@deskdoge/shared";
import type { AnimationChange, CompletionEvent, PointerEvent } from "@deskdoge/shared";

export type BusEvents = {
  pointer: (e: PointerEvent) => void;
  completion: (e: CompletionEvent) => void;
  animation: (c: AnimationChange) => void;
};

export class MainBus extends EventEmitter {
  emitPointer(e: PointerEvent) {
    this.emit(BUS_CHANNELS.pointer, e);
  }

  onPointer(handler: BusEvents["pointer"]) {
    this.on(BUS_CHANNELS.pointer, handler);
    return () => this.off(BUS_CHANNELS.pointer, handler);
  }

  emitCompletion(e: CompletionEvent) {
    this.emit(BUS_CHANNELS.completion, e);
  }

  onCompletion(handler: BusEvents["completion"]) {
    this.on(BUS_CHANNELS.completion, handler);
    return () => this.off(BUS_CHANNELS.completion, handler);
  }

  emitAnimation(c: AnimationChange) {
    this.emit(BUS_CHANNELS.animation, c);
  }

  onAnimation(handler: BusEvents["animation"]) {
    this.on(BUS_CHANNELS.animation, handler);
    return () => this.off(BUS_CHANNELS.animation, handler);
  }
}
