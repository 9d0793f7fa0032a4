import { createInterface } from "node:readline";
import type { Interface } from "node:readline";
import type { Readable } from "node:stream";
import type { AnchorWindow, CredentialPrompt } from "../protocol/types";
import type { HeadlessWindowHost } from "./headless.host";

const HELP = [
  "commands:",
  "  click            single click (price bubble)",
  "  double           double click (chat)",
  "  drag <dx> <dy>   move the mascot",
  "  right            context menu",
  "  menu <n>         pick a menu entry",
  "  esc              dismiss the input bubble",
  "  quit"
].join("\n");

export type TerminalDriverOpts = {
  input: Readable;
  host: HeadlessWindowHost;
  anchor: AnchorWindow;
  /** Raw pointer events go through the app's validating entry point. */
  dispatch: (raw: unknown) => boolean;
  onQuit: () => void;
  now?: () => number;
};

/**
 * Turns stdin lines into pointer events. While the input bubble is open, lines are typed
 * into it instead; while a credential prompt is pending, the next line answers it.
 */
export class TerminalDriver implements CredentialPrompt {
  #opts: TerminalDriverOpts;
  #now: () => number;
  #rl: Interface | null = null;
  #closed = false;
  #pendingSecret: ((secret: string | null) => void) | null = null;

  constructor(opts: TerminalDriverOpts) {
    this.#opts = opts;
    this.#now = opts.now ?? (() => Date.now());
  }

  start() {
    if (this.#rl || this.#closed) return;
    const rl = createInterface({ input: this.#opts.input, terminal: false });
    rl.on("line", (line) => this.handleLine(line));
    rl.on("close", () => {
      this.#rl = null;
      this.#closed = true;
      this.#answerSecret(null);
    });
    this.#rl = rl;
    console.log(HELP);
  }

  stop() {
    this.#closed = true;
    this.#rl?.close();
    this.#rl = null;
  }

  /** Resolves null at once when stdin has already closed: no line can answer it. */
  requestSecret(): Promise<string | null> {
    this.#answerSecret(null);
    if (this.#closed) {
      console.warn("[prompt] input closed, cannot ask for an API key");
      return Promise.resolve(null);
    }
    console.log("[prompt] OpenAI API key (empty line cancels):");
    return new Promise((resolve) => {
      this.#pendingSecret = resolve;
    });
  }

  handleLine(raw: string) {
    const line = raw.trim();

    if (this.#pendingSecret) {
      this.#answerSecret(line || null);
      return;
    }

    const { host } = this.#opts;
    if (host.input) {
      if (line === "esc") host.dismissInput();
      else host.submitInput(line);
      return;
    }

    const [cmd = "", ...args] = line.split(/\s+/);
    switch (cmd) {
      case "":
        return;
      case "click":
        this.#pointer({ event: "PRESS", x: 0, y: 0 });
        this.#pointer({ event: "RELEASE", clickCount: 1 });
        return;
      case "double":
        this.#pointer({ event: "DOUBLE_CLICK" });
        return;
      case "drag": {
        const dx = Number(args[0] ?? 0);
        const dy = Number(args[1] ?? 0);
        this.#pointer({ event: "PRESS", x: 0, y: 0 });
        this.#pointer({ event: "DRAG", dx, dy });
        this.#pointer({ event: "RELEASE", clickCount: 1 });
        return;
      }
      case "right": {
        const f = this.#opts.anchor.getFrame();
        this.#pointer({ event: "RIGHT_CLICK", x: f.x + f.width / 2, y: f.y + f.height / 2 });
        return;
      }
      case "menu":
        if (!host.chooseMenu(Number(args[0]))) console.log("no such menu entry");
        return;
      case "quit":
      case "exit":
        this.#opts.onQuit();
        return;
      case "help":
        console.log(HELP);
        return;
      default:
        console.log(`unknown command: ${cmd} (try "help")`);
    }
  }

  #pointer(e: Record<string, unknown>) {
    this.#opts.dispatch({ type: "POINTER", ts: this.#now(), ...e });
  }

  #answerSecret(secret: string | null) {
    const resolve = this.#pendingSecret;
    this.#pendingSecret = null;
    resolve?.(secret);
  }
}
