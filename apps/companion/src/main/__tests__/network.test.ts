import { afterEach, describe, expect, it, vi } from "vitest";
import { LLMService } from "../services/llm.service";
import { MarketDataService } from "../services/market-data.service";
import { WebSearchService, instantAnswer } from "../services/web-search.service";

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(typeof body === "string" ? body : JSON.stringify(body), { status })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestedUrl(mock: ReturnType<typeof stubFetch>) {
  const input = mock.mock.calls[0]?.[0];
  return new URL(String(input));
}

/** Headers arrive at once; the body never does, and errors only when the request is aborted. */
function stubStalledBody() {
  const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
    const signal = init?.signal;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        signal?.addEventListener("abort", () => controller.error(new Error("aborted")));
      }
    });
    return new Response(body, { status: 200, headers: { "Content-Type": "application/json" } });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** Never answers and ignores the abort signal. */
function stubHungFetch() {
  const fetchMock = vi.fn((_input: string | URL | Request, _init?: RequestInit) => new Promise<Response>(() => {}));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function settled(p: Promise<unknown>) {
  return p.then(
    (value) => ({ value }),
    (err: unknown) => ({ error: err instanceof Error ? err.message : String(err) })
  );
}

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllGlobals();
});

describe("MarketDataService", () => {
  it("reads the current price and 24h change", async () => {
    const fetchMock = stubFetch(200, [{ id: "dogecoin", current_price: 0.1234, price_change_percentage_24h: -2.5 }]);

    const quote = await new MarketDataService().fetch("dogecoin");

    expect(quote).toEqual({ price: 0.1234, change24h: -2.5 });
    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe("/api/v3/coins/markets");
    expect(url.searchParams.get("ids")).toBe("dogecoin");
    expect(url.searchParams.get("vs_currency")).toBe("usd");
  });

  it("reports a missing change as null", async () => {
    stubFetch(200, [{ id: "dogecoin", current_price: 0.2, price_change_percentage_24h: null }]);
    expect(await new MarketDataService().fetch("dogecoin")).toEqual({ price: 0.2, change24h: null });
  });

  it("throws when the coin is unknown", async () => {
    stubFetch(200, []);
    await expect(new MarketDataService().fetch("nope")).rejects.toThrow("[market-data] no price for nope");
  });

  it("throws on HTTP errors", async () => {
    stubFetch(429, "slow down");
    await expect(new MarketDataService().fetch("dogecoin")).rejects.toThrow("[market-data] HTTP 429: slow down");
  });
});

describe("web search", () => {
  it("prefers the abstract over the heading", async () => {
    const fetchMock = stubFetch(200, { AbstractText: " Dogecoin is a cryptocurrency. ", Heading: "Dogecoin" });

    expect(await instantAnswer("dogecoin")).toBe("Dogecoin is a cryptocurrency.");
    const url = requestedUrl(fetchMock);
    expect(url.searchParams.get("q")).toBe("dogecoin");
    expect(url.searchParams.get("format")).toBe("json");
    expect(url.searchParams.get("no_html")).toBe("1");
  });

  it("falls back to the heading", async () => {
    stubFetch(200, { AbstractText: "", Heading: "Dogecoin" });
    expect(await instantAnswer("dogecoin")).toBe("Dogecoin");
  });

  it("caps the snippet length", async () => {
    stubFetch(200, { AbstractText: "x".repeat(800) });
    expect(await new WebSearchService({ maxChars: 700 }).query("much text")).toHaveLength(700);
  });

  it("returns empty instead of throwing", async () => {
    stubFetch(500, "down");
    expect(await new WebSearchService().query("dogecoin")).toBe("");
  });

  it("does nothing when disabled or for a blank query", async () => {
    const fetchMock = stubFetch(200, { AbstractText: "x" });
    expect(await new WebSearchService({ enabled: false }).query("dogecoin")).toBe("");
    expect(await instantAnswer("   ")).toBe("");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("LLMService", () => {
  it("posts the conversation with a bearer token", async () => {
    const fetchMock = stubFetch(200, { choices: [{ message: { content: "  Wow. <mood:WOW>  " } }] });
    const llm = new LLMService({ baseUrl: "http://llm.test/v1/", getApiKey: () => "test-secret" });

    const text = await llm.complete("test-model", [{ role: "user", content: "hi" }]);

    expect(text).toBe("Wow. <mood:WOW>");
    const [input, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(input)).toBe("http://llm.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
    expect(JSON.parse(String(init?.body))).toEqual({ model: "test-model", messages: [{ role: "user", content: "hi" }] });
  });

  it("clamps the temperature", async () => {
    const fetchMock = stubFetch(200, { choices: [{ message: { content: "ok" } }] });
    const llm = new LLMService({ getApiKey: () => "test-secret", temperature: 5 });
    await llm.complete("m", []);
    expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body)).temperature).toBe(2);
  });

  it("refuses to call out without a key", async () => {
    const fetchMock = stubFetch(200, {});
    const llm = new LLMService({ getApiKey: () => null });
    expect(llm.isConfigured()).toBe(false);
    await expect(llm.complete("m", [])).rejects.toThrow("[llm] missing API key");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects on an unexpected body or HTTP error", async () => {
    stubFetch(200, { choices: [] });
    const llm = new LLMService({ getApiKey: () => "test-secret" });
    await expect(llm.complete("m", [])).rejects.toThrow("[openai] unexpected response shape");

    stubFetch(401, "bad key");
    await expect(llm.complete("m", [])).rejects.toThrow("[openai] HTTP 401: bad key");
  });
});

describe("request deadline", () => {
  it("fails a completion whose body stalls after the headers", async () => {
    vi.useFakeTimers();
    const fetchMock = stubStalledBody();
    const llm = new LLMService({ getApiKey: () => "test-secret", timeoutMs: 5000 });

    const outcome = settled(llm.complete("m", [{ role: "user", content: "hi" }]));
    await vi.advanceTimersByTimeAsync(5000);

    expect(await outcome).toEqual({ error: "[openai] timed out after 5000ms" });
    expect(fetchMock.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);
  });

  it("does not give up before the deadline", async () => {
    vi.useFakeTimers();
    stubStalledBody();
    const llm = new LLMService({ getApiKey: () => "test-secret", timeoutMs: 5000 });

    let done = false;
    const outcome = settled(llm.complete("m", [])).then((r) => {
      done = true;
      return r;
    });
    await vi.advanceTimersByTimeAsync(4999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(await outcome).toEqual({ error: "[openai] timed out after 5000ms" });
  });

  it("fails a quote whose request never answers", async () => {
    vi.useFakeTimers();
    stubHungFetch();

    const outcome = settled(new MarketDataService({ timeoutMs: 5000 }).fetch("dogecoin"));
    await vi.advanceTimersByTimeAsync(5000);

    expect(await outcome).toEqual({ error: "[market-data] timed out after 5000ms" });
  });

  it("fails a quote whose body stalls", async () => {
    vi.useFakeTimers();
    stubStalledBody();

    const outcome = settled(new MarketDataService({ timeoutMs: 5000 }).fetch("dogecoin"));
    await vi.advanceTimersByTimeAsync(5000);

    expect(await outcome).toEqual({ error: "[market-data] timed out after 5000ms" });
  });

  it("turns a slow lookup into an empty snippet", async () => {
    vi.useFakeTimers();
    stubStalledBody();

    const outcome = settled(new WebSearchService({ timeoutMs: 5000 }).query("dogecoin"));
    await vi.advanceTimersByTimeAsync(5000);

    expect(await outcome).toEqual({ value: "" });
  });

  it("rejects a direct lookup that never answers", async () => {
    vi.useFakeTimers();
    stubHungFetch();

    const outcome = settled(instantAnswer("dogecoin", { timeoutMs: 5000 }));
    await vi.advanceTimersByTimeAsync(5000);

    expect(await outcome).toEqual({ error: "[web-search] timed out after 5000ms" });
  });
});
