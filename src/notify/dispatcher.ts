import { createLogger } from "../utils/logger.js";
import { elapsedMs, nowMs } from "../utils/time.js";
import type { Metrics } from "../monitoring/metrics.js";
import type { RenderedSummary } from "../watch/summary.js";
import type { Sink, SinkOutcome } from "./types.js";

const logger = createLogger("Dispatcher");

export interface DispatcherConfig {
  /** Upper bound for a single sink call. */
  sinkTimeoutMs: number;
}

class SinkTimeoutError extends Error {
  constructor(ms: number) {
    super(`timed out after ${ms}ms`);
    this.name = "SinkTimeoutError";
  }
}

/**
 * Fans a summary out to every sink at once. Each call has its own timeout and
 * failure domain; `dispatch` itself never rejects.
 */
export class NotificationDispatcher {
  constructor(
    private readonly sinks: readonly Sink[],
    private readonly cfg: DispatcherConfig,
    private readonly metrics?: Metrics
  ) {}

  get sinkIds(): string[] {
    return this.sinks.map((s) => s.id);
  }

  async dispatch(summary: RenderedSummary): Promise<SinkOutcome[]> {
    return Promise.all(this.sinks.map((sink) => this.deliver(sink, summary)));
  }

  private async deliver(sink: Sink, summary: RenderedSummary): Promise<SinkOutcome> {
    const start = nowMs();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new SinkTimeoutError(this.cfg.sinkTimeoutMs));
      }, this.cfg.sinkTimeoutMs);
    });

    try {
      await Promise.race([sink.notify(summary, controller.signal), timeout]);
      const took = elapsedMs(start);
      logger.debug({ sink: sink.id, elapsedMs: took }, "Sink notified");
      return { sinkId: sink.id, ok: true, elapsedMs: took };
    } catch (err) {
      const took = elapsedMs(start);
      const timedOut = err instanceof SinkTimeoutError;
      this.metrics?.inc("sink_failures");
      logger.warn({ sink: sink.id, timedOut, elapsedMs: took, err: String(err) }, "Sink failed");
      return { sinkId: sink.id, ok: false, elapsedMs: took, timedOut, error: String(err) };
    } finally {
      clearTimeout(timer);
    }
  }
}
