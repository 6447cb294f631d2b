import { createLogger } from "../utils/logger.js";
import { extractSection, htmlToText, type SectionOptions } from "./htmlText.js";
import { FetchError, type PageSource, type RawSnapshot } from "./types.js";

const logger = createLogger("HttpPageSource");

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export interface HttpPageSourceConfig extends SectionOptions {
  url: string;
  timeoutMs: number;
  userAgent?: string;
}

/** Fetch implementation; injectable so tests never touch the network. */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Downloads the watched page on every poll, bypassing caches, and returns the
 * text of the positions section.
 */
export class HttpPageSource implements PageSource {
  readonly origin: string;

  constructor(
    private readonly cfg: HttpPageSourceConfig,
    private readonly fetchFn: FetchFn = fetch
  ) {
    this.origin = cfg.url;
  }

  async fetch(signal?: AbortSignal): Promise<RawSnapshot> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.cfg.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let body: string;
    try {
      const res = await this.fetchFn(this.cfg.url, {
        method: "GET",
        headers: {
          "Cache-Control": "no-cache, no-store, must-revalidate",
          Pragma: "no-cache",
          Expires: "0",
          "Accept-Language": "en-US,en;q=0.9",
          "User-Agent": this.cfg.userAgent ?? DEFAULT_USER_AGENT,
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        const retryAfter = res.headers.get("retry-after");
        throw new FetchError(`HTTP ${res.status} from ${this.cfg.url}`, {
          status: res.status,
          retryAfterMs: retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined,
        });
      }
      body = await res.text();
    } catch (err) {
      if (err instanceof FetchError) throw err;
      const reason = controller.signal.aborted && !signal?.aborted ? `timed out after ${this.cfg.timeoutMs}ms` : String(err);
      throw new FetchError(`Fetch failed for ${this.cfg.url}: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    const text = extractSection(htmlToText(body), this.cfg);
    logger.debug({ url: this.cfg.url, bytes: body.length, sectionChars: text.length }, "Page fetched");
    return { text, capturedAt: new Date(), origin: this.origin };
  }
}
