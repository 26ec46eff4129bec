import { FetchError } from "./errors";
import { DEFAULT_USER_AGENT } from "./settings";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type FetchRequest = {
  url: string;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string | null;
};

export type FetchedPage = {
  url: string;
  status: number;
  headers: Headers;
  body: string;
};

export type FetchOutcome =
  | { ok: true; page: FetchedPage; attempts: number }
  | { ok: false; error: FetchError };

export type FetcherOptions = {
  sourceId: string;
  minDelayMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  userAgent?: string;
  fetchImpl?: FetchFn;
  sleep?: SleepFn;
  now?: () => number;
};

type AttemptResult =
  | { kind: "ok"; page: FetchedPage }
  | { kind: "retry"; error: FetchError; retryAfterMs: number | null }
  | { kind: "fail"; error: FetchError };

export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const parseRetryAfter = (value: string | null, nowMs: number): number | null => {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - nowMs);
};

const isRetryableStatus = (status: number) => status === 408 || status === 429 || status >= 500;

export class RateLimitedFetcher {
  readonly sourceId: string;
  private readonly minDelayMs: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchFn;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private lastRequestAt: number | null = null;

  constructor(options: FetcherOptions) {
    this.sourceId = options.sourceId;
    this.minDelayMs = Math.max(0, options.minDelayMs ?? 0);
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = Math.max(0, options.maxRetries ?? 2);
    this.backoffBaseMs = options.backoffBaseMs ?? 500;
    this.backoffMaxMs = options.backoffMaxMs ?? 30_000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  backoffFor(attempt: number) {
    return Math.min(this.backoffMaxMs, this.backoffBaseMs * 2 ** (attempt - 1));
  }

  async fetch(request: FetchRequest, signal?: AbortSignal): Promise<FetchOutcome> {
    const maxAttempts = this.maxRetries + 1;
    let lastError: FetchError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        return { ok: false, error: this.cancelled(request.url, attempt - 1) };
      }
      await this.waitForSlot(signal);
      if (signal?.aborted) {
        return { ok: false, error: this.cancelled(request.url, attempt - 1) };
      }

      const result = await this.attempt(request, attempt, signal);
      if (result.kind === "ok") {
        return { ok: true, page: result.page, attempts: attempt };
      }
      if (result.kind === "fail") {
        return { ok: false, error: result.error };
      }

      lastError = result.error;
      if (attempt === maxAttempts) {
        break;
      }

      let delay = this.backoffFor(attempt);
      if (result.error.status === 429) {
        delay = Math.min(this.backoffMaxMs, Math.max(result.retryAfterMs ?? 0, delay * 2));
      }
      console.warn(
        `[fetch:${this.sourceId}] attempt ${attempt}/${maxAttempts} failed (${result.error.message}); retrying in ${delay}ms`,
      );
      await this.sleep(delay, signal);
    }

    return { ok: false, error: lastError ?? this.cancelled(request.url, maxAttempts) };
  }

  private async waitForSlot(signal?: AbortSignal) {
    if (this.lastRequestAt !== null) {
      const wait = this.lastRequestAt + this.minDelayMs - this.now();
      if (wait > 0) {
        await this.sleep(wait, signal);
      }
    }
    this.lastRequestAt = this.now();
  }

  private cancelled(url: string, attempts: number) {
    return new FetchError("cancelled", `Request cancelled: ${url}`, { url, attempts });
  }

  private async attempt(request: FetchRequest, attempt: number, signal?: AbortSignal): Promise<AttemptResult> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method ?? "GET",
        body: request.body ?? undefined,
        signal: controller.signal,
        headers: {
          "User-Agent": this.userAgent,
          ...request.headers,
        },
      });
      const body = await response.text();

      if (response.ok) {
        return {
          kind: "ok",
          page: { url: response.url || request.url, status: response.status, headers: response.headers, body },
        };
      }

      const error = new FetchError("http_status", `Fetch failed (${response.status})`, {
        url: request.url,
        attempts: attempt,
        status: response.status,
      });
      if (!isRetryableStatus(response.status)) {
        return { kind: "fail", error };
      }
      return {
        kind: "retry",
        error,
        retryAfterMs: parseRetryAfter(response.headers.get("retry-after"), this.now()),
      };
    } catch (error) {
      if (signal?.aborted) {
        return { kind: "fail", error: this.cancelled(request.url, attempt) };
      }
      if (timedOut) {
        return {
          kind: "retry",
          error: new FetchError("timeout", `Timed out after ${this.timeoutMs}ms`, {
            url: request.url,
            attempts: attempt,
            cause: error,
          }),
          retryAfterMs: null,
        };
      }
      return {
        kind: "retry",
        error: new FetchError(
          "connection_failed",
          `Connection failed: ${error instanceof Error ? error.message : String(error)}`,
          { url: request.url, attempts: attempt, cause: error },
        ),
        retryAfterMs: null,
      };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
