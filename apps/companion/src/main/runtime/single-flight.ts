/** Non-blocking mutual exclusion: at most one holder, contenders are turned away rather than queued. */
export class SingleFlightLock {
  #held = false;

  get held() {
    return this.#held;
  }

  tryAcquire() {
    if (this.#held) return false;
    this.#held = true;
    return true;
  }

  release() {
    this.#held = false;
  }
}
