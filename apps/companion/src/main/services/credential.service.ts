import { chmodSync, existsSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { CredentialPrompt } from "../protocol/types";

export const DEFAULT_CREDENTIAL_PATH = join(homedir(), ".openai_api_key");

/** One secret string in a file only its owner can read or write. */
export class CredentialStore {
  readonly path: string;

  constructor(path: string = DEFAULT_CREDENTIAL_PATH) {
    this.path = path;
  }

  read(): string | null {
    try {
      if (!existsSync(this.path)) return null;
      const s = readFileSync(this.path, "utf-8").trim();
      return s || null;
    } catch (err) {
      console.warn("[credential] failed to read stored key:", err);
      return null;
    }
  }

  write(secret: string) {
    writeFileSync(this.path, `${secret.trim()}\n`, { encoding: "utf-8", mode: 0o600 });
    // `mode` only applies when the file is created.
    chmodSync(this.path, 0o600);
  }
}

export class CredentialService {
  #store: CredentialStore;
  #secret: string | null;

  constructor(opts: { store: CredentialStore; env?: NodeJS.ProcessEnv }) {
    this.#store = opts.store;
    const fromEnv = String(opts.env?.OPENAI_API_KEY ?? "").trim();
    this.#secret = fromEnv || this.#store.read();
  }

  get secret() {
    return this.#secret;
  }

  has() {
    return Boolean(this.#secret);
  }

  /** Prompts for the secret when none is held. Resolves false when the user cancels. */
  async ensure(prompt: CredentialPrompt): Promise<boolean> {
    if (this.#secret) return true;

    const entered = String((await prompt.requestSecret()) ?? "").trim();
    if (!entered) return false;

    this.#secret = entered;
    try {
      this.#store.write(entered);
    } catch (err) {
      // Still usable for this process.
      console.warn(`[credential] could not persist key to ${this.#store.path}:`, err);
    }
    return true;
  }
}
