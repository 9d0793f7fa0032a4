import { NETWORK_TIMEOUT_MS } from "@deskdoge/shared";

/** Parsed JSON body of a 2xx response; throws `HTTP <status>: <body>` otherwise. */
export async function readJsonOrThrow(res: Response, scope: string): Promise<unknown> {
  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new Error(`[${scope}] HTTP ${res.status}: ${text.slice(0, 500)}`);
  }
  return await res.json();
}

/**
 * Request plus body read under one deadline. The timer stays armed until the JSON has been read,
 * so a server that sends headers and then stalls still fails with `[<scope>] timed out after <ms>ms`.
 */
export async function fetchJsonWithTimeout(
  input: string | URL,
  init: RequestInit,
  scope: string,
  timeoutMs: number = NETWORK_TIMEOUT_MS
): Promise<unknown> {
  const ms = Math.max(1, timeoutMs);
  const ctrl = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`[${scope}] timed out after ${ms}ms`));
      ctrl.abort();
    }, ms);
  });

  const exchange = async () => {
    const res = await fetch(input, { ...init, signal: ctrl.signal });
    return await readJsonOrThrow(res, scope);
  };

  try {
    return await Promise.race([exchange(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
