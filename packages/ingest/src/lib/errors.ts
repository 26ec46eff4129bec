export type IngestErrorOptions = {
  details?: Record<string, unknown>;
  cause?: unknown;
};

export class IngestError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, options: IngestErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "IngestError";
    this.code = code;
    this.details = options.details;
  }
}

export type FetchErrorKind = "timeout" | "http_status" | "connection_failed" | "cancelled";

export class FetchError extends IngestError {
  readonly kind: FetchErrorKind;
  readonly attempts: number;
  readonly status: number | null;
  readonly url: string;

  constructor(
    kind: FetchErrorKind,
    message: string,
    info: { url: string; attempts: number; status?: number | null; cause?: unknown },
  ) {
    super("FETCH_FAILED", message, {
      details: { kind, url: info.url, attempts: info.attempts, status: info.status ?? null },
      cause: info.cause,
    });
    this.name = "FetchError";
    this.kind = kind;
    this.attempts = info.attempts;
    this.status = info.status ?? null;
    this.url = info.url;
  }
}

export class ParseError extends IngestError {
  constructor(message: string, options: IngestErrorOptions = {}) {
    super("PARSE_FAILED", message, options);
    this.name = "ParseError";
  }
}

export class ConfigError extends IngestError {
  readonly sourceId: string | null;

  constructor(message: string, options: IngestErrorOptions & { sourceId?: string | null } = {}) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
    this.sourceId = options.sourceId ?? null;
  }
}

export class StoreError extends IngestError {
  constructor(message: string, options: IngestErrorOptions = {}) {
    super("STORE_FAILED", message, options);
    this.name = "StoreError";
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
