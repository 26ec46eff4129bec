import { describe, expect, it } from "vitest";
import { RateLimitedFetcher, parseRetryAfter, type FetchFn, type FetcherOptions } from "../src/lib/fetcher";

const scripted = (responses: Array<Response | Error>) => {
  const calls: Array<{ url: string; init?: RequestInit }> = [];
  const fetchImpl: FetchFn = async (url, init) => {
    calls.push({ url, init });
    const next = responses.shift();
    if (!next) {
      throw new Error("no scripted response left");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  return { fetchImpl, calls };
};

const fakeClock = () => {
  let clock = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => clock,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      clock += ms;
    },
  };
};

const build = (fetchImpl: FetchFn, overrides: Partial<FetcherOptions> = {}) => {
  const clock = fakeClock();
  const fetcher = new RateLimitedFetcher({
    sourceId: "test",
    minDelayMs: 0,
    maxRetries: 2,
    backoffBaseMs: 100,
    fetchImpl,
    sleep: clock.sleep,
    now: clock.now,
    ...overrides,
  });
  return { fetcher, clock };
};

describe("RateLimitedFetcher", () => {
  it("retries server errors with exponential backoff", async () => {
    const { fetchImpl, calls } = scripted([new Response("busy", { status: 503 }), new Response("ok")]);
    const { fetcher, clock } = build(fetchImpl);

    const outcome = await fetcher.fetch({ url: "https://example.test/list" });

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.attempts).toBe(2);
      expect(outcome.page.body).toBe("ok");
      expect(outcome.page.url).toBe("https://example.test/list");
    }
    expect(calls).toHaveLength(2);
    expect(clock.sleeps).toEqual([100]);
  });

  it("gives up after the retry budget", async () => {
    const { fetchImpl, calls } = scripted([
      new Response("", { status: 500 }),
      new Response("", { status: 500 }),
      new Response("", { status: 500 }),
    ]);
    const { fetcher, clock } = build(fetchImpl);

    const outcome = await fetcher.fetch({ url: "https://example.test/list" });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe("http_status");
      expect(outcome.error.status).toBe(500);
      expect(outcome.error.attempts).toBe(3);
    }
    expect(calls).toHaveLength(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it("does not retry client errors", async () => {
    const { fetchImpl, calls } = scripted([new Response("missing", { status: 404 })]);
    const { fetcher } = build(fetchImpl);

    const outcome = await fetcher.fetch({ url: "https://example.test/missing" });

    expect(calls).toHaveLength(1);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe("http_status");
      expect(outcome.error.status).toBe(404);
      expect(outcome.error.attempts).toBe(1);
    }
  });

  it("extends the backoff on 429 using Retry-After", async () => {
    const { fetchImpl } = scripted([
      new Response("slow down", { status: 429, headers: { "Retry-After": "3" } }),
      new Response("ok"),
    ]);
    const { fetcher, clock } = build(fetchImpl);

    const outcome = await fetcher.fetch({ url: "https://example.test/list" });

    expect(outcome.ok).toBe(true);
    expect(clock.sleeps).toEqual([3000]);
  });

  it("doubles the backoff on 429 without Retry-After", async () => {
    const { fetchImpl } = scripted([new Response("", { status: 429 }), new Response("ok")]);
    const { fetcher, clock } = build(fetchImpl);

    await fetcher.fetch({ url: "https://example.test/list" });

    expect(clock.sleeps).toEqual([200]);
  });

  it("classifies connection failures", async () => {
    const { fetchImpl, calls } = scripted([new TypeError("fetch failed"), new TypeError("fetch failed")]);
    const { fetcher } = build(fetchImpl, { maxRetries: 1 });

    const outcome = await fetcher.fetch({ url: "https://example.test/list" });

    expect(calls).toHaveLength(2);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe("connection_failed");
      expect(outcome.error.attempts).toBe(2);
    }
  });

  it("times out slow requests", async () => {
    const fetchImpl: FetchFn = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const { fetcher } = build(fetchImpl, { maxRetries: 0, timeoutMs: 20 });

    const outcome = await fetcher.fetch({ url: "https://example.test/slow" });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe("timeout");
      expect(outcome.error.attempts).toBe(1);
    }
  });

  it("waits out the per-source delay between requests", async () => {
    const { fetchImpl } = scripted([new Response("one"), new Response("two")]);
    const { fetcher, clock } = build(fetchImpl, { minDelayMs: 500 });

    await fetcher.fetch({ url: "https://example.test/1" });
    await fetcher.fetch({ url: "https://example.test/2" });

    expect(clock.sleeps).toEqual([500]);
  });

  it("sends the user agent and request body", async () => {
    const { fetchImpl, calls } = scripted([new Response("{}")]);
    const { fetcher } = build(fetchImpl, { userAgent: "test-agent" });

    await fetcher.fetch({
      url: "https://example.test/api",
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{"page":1}',
    });

    expect(calls[0].init?.method).toBe("POST");
    expect(calls[0].init?.body).toBe('{"page":1}');
    expect(calls[0].init?.headers).toEqual({ "User-Agent": "test-agent", "Content-Type": "application/json" });
  });

  it("reports cancellation without calling the network", async () => {
    const { fetchImpl, calls } = scripted([new Response("ok")]);
    const { fetcher } = build(fetchImpl);
    const controller = new AbortController();
    controller.abort();

    const outcome = await fetcher.fetch({ url: "https://example.test/list" }, controller.signal);

    expect(calls).toHaveLength(0);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe("cancelled");
    }
  });
});

describe("parseRetryAfter", () => {
  it("reads seconds and http dates", () => {
    expect(parseRetryAfter("2", 0)).toBe(2000);
    expect(parseRetryAfter("Thu, 01 Jan 1970 00:00:05 GMT", 1000)).toBe(4000);
    expect(parseRetryAfter(null, 0)).toBeNull();
    expect(parseRetryAfter("soon", 0)).toBeNull();
  });
});
