/** One point-in-time capture of the watched page section. */
export interface RawSnapshot {
  text: string;
  capturedAt: Date;
  /** URL or file path the text came from. */
  origin: string;
}

/**
 * Anything that can produce the current page text on demand. Implementations
 * reject with {@link FetchError} only.
 */
export interface PageSource {
  readonly origin: string;
  fetch(signal?: AbortSignal): Promise<RawSnapshot>;
}

export interface FetchErrorOptions {
  cause?: unknown;
  /** HTTP status, when the server answered. */
  status?: number;
  /** Server-requested wait before the next attempt (Retry-After). */
  retryAfterMs?: number;
}

/** The page could not be loaded this time. Always retried by the poll loop. */
export class FetchError extends Error {
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(message: string, options: FetchErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export function retryAfterOf(error: Error): number | null {
  return error instanceof FetchError && error.retryAfterMs !== undefined ? error.retryAfterMs : null;
}
