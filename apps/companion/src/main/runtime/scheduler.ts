export interface TimerHandle {
  readonly active: boolean;
  cancel(): void;
}

/**
 * Timers and hand-offs for the UI-owning context.
 *
 * Every callback scheduled here, and every action passed to `post`, runs as its own
 * event-loop task, so background work can only reach UI state through `post`.
 */
export interface Scheduler {
  schedule(delayMs: number, repeating: boolean, action: () => void): TimerHandle;
  post(action: () => void): void;
  now(): number;
}

export class NodeScheduler implements Scheduler {
  #live = new Set<TimerHandle>();

  schedule(delayMs: number, repeating: boolean, action: () => void): TimerHandle {
    const ms = Math.max(0, Math.floor(Number(delayMs) || 0));
    const live = this.#live;
    let timer: NodeJS.Timeout | null = null;

    const handle: TimerHandle = {
      get active() {
        return timer !== null;
      },
      cancel() {
        if (!timer) return;
        if (repeating) clearInterval(timer);
        else clearTimeout(timer);
        timer = null;
        live.delete(handle);
      }
    };

    const run = () => {
      if (!repeating) {
        timer = null;
        live.delete(handle);
      }
      try {
        action();
      } catch (err) {
        console.error("[scheduler] timer action failed:", err);
      }
    };

    timer = repeating ? setInterval(run, Math.max(1, ms)) : setTimeout(run, ms);
    live.add(handle);
    return handle;
  }

  post(action: () => void) {
    this.schedule(0, false, action);
  }

  now() {
    return Date.now();
  }

  get pending() {
    return this.#live.size;
  }

  cancelAll() {
    for (const h of [...this.#live]) h.cancel();
  }
}
