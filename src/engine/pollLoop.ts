import { createLogger } from "../utils/logger.js";
import { retry } from "../utils/retry.js";
import { sleep } from "../utils/sleep.js";
import { elapsedMs, nowMs } from "../utils/time.js";
import type { HealthMonitor } from "../monitoring/health.js";
import type { Metrics } from "../monitoring/metrics.js";
import type { NotificationDispatcher } from "../notify/dispatcher.js";
import type { SinkOutcome } from "../notify/types.js";
import { retryAfterOf, type PageSource, type RawSnapshot } from "../source/types.js";
import { buildLogRecord } from "../storage/positionLog.js";
import type { PersistenceOutcome, PersistenceWriter } from "../storage/writer.js";
import type { ChangeDetector } from "../watch/detector.js";
import type { StateNormalizer } from "../watch/normalizer.js";
import { summarizeChange } from "../watch/summary.js";
import { isDegraded, type ChangeEvent, type NormalizedState } from "../watch/types.js";

const logger = createLogger("PollLoop");

export interface PollLoopConfig {
  model: string;
  pollIntervalMs: number;
  retryCooldownMs: number;
  /** Failed connection attempts tolerated at startup; 0 = unlimited. */
  startupMaxAttempts: number;
  metricsLogEvery: number;
}

export interface PollLoopDeps {
  source: PageSource;
  normalizer: StateNormalizer;
  detector: ChangeDetector;
  dispatcher: NotificationDispatcher;
  persistence: PersistenceWriter;
  metrics: Metrics;
  health: HealthMonitor;
}

export type IterationResult =
  | { kind: "fetch_failed"; error: Error }
  | { kind: "baseline"; state: NormalizedState }
  | { kind: "unchanged"; state: NormalizedState }
  | { kind: "changed"; event: ChangeEvent; sinks: SinkOutcome[]; persistence: PersistenceOutcome[] };

/** The source could not be reached before the loop started. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StartupError";
  }
}

/**
 * Drives fetch → normalise → detect → (dispatch ∥ persist), one iteration at
 * a time. The next wait starts only after an iteration has fully finished.
 */
export class PollLoop {
  private iterations = 0;
  private degraded = false;

  constructor(
    private readonly deps: PollLoopDeps,
    private readonly cfg: PollLoopConfig
  ) {}

  /**
   * Runs until `signal` aborts. Resolves after the iteration in progress has
   * completed its writes; rejects only with {@link StartupError}.
   */
  async run(signal: AbortSignal): Promise<void> {
    const { metrics } = this.deps;

    let first: RawSnapshot;
    try {
      first = await this.connect(signal);
    } catch (err) {
      if (signal.aborted) return;
      throw new StartupError(`Cannot reach ${this.deps.source.origin}: ${String(err)}`, { cause: err });
    }

    await this.iterate(() => Promise.resolve(first));

    let delayMs = this.cfg.pollIntervalMs;
    while (!signal.aborted) {
      await sleep(delayMs, signal);
      if (signal.aborted) break;

      const result = await this.runOnce(signal);
      delayMs = result.kind === "fetch_failed" ? this.cooldownAfter(result.error) : this.cfg.pollIntervalMs;
    }

    logger.info({ iterations: this.iterations }, "Poll loop stopped");
    metrics.log();
  }

  /** Startup: keep fetching at the cooldown until the first snapshot arrives. */
  async connect(signal?: AbortSignal): Promise<RawSnapshot> {
    const { source } = this.deps;
    return retry(() => source.fetch(signal), {
      maxAttempts: this.cfg.startupMaxAttempts > 0 ? this.cfg.startupMaxAttempts : Infinity,
      // Every failure is retried; only the attempt limit or a stop ends startup.
      retryIf: () => true,
      retryAfterMs: (err) => this.cooldownAfter(err),
      signal,
      onRetry: (attempt, err, delayMs) => {
        this.deps.metrics.inc("fetch_failures");
        logger.warn({ origin: source.origin, attempt, retryInMs: delayMs, err: String(err) }, "Initial load failed, retrying");
      },
    });
  }

  /** The configured cooldown, stretched to any wait the server asked for. */
  private cooldownAfter(error: Error): number {
    return Math.max(this.cfg.retryCooldownMs, retryAfterOf(error) ?? 0);
  }

  /** One complete iteration against the live source. */
  async runOnce(signal?: AbortSignal): Promise<IterationResult> {
    return this.iterate(() => this.deps.source.fetch(signal), signal);
  }

  private async iterate(fetchSnapshot: () => Promise<RawSnapshot>, signal?: AbortSignal): Promise<IterationResult> {
    const { metrics, health } = this.deps;
    this.iterations++;
    health.markLoopStart();
    metrics.inc("polls");

    try {
      const started = nowMs();
      let snapshot: RawSnapshot;
      try {
        snapshot = await fetchSnapshot();
        metrics.observe("fetch_ms", elapsedMs(started));
        health.markFetch(true);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        health.markFetch(false);
        metrics.inc("fetch_failures");
        if (signal?.aborted) {
          logger.debug({ err: String(error) }, "Fetch aborted by shutdown");
        } else {
          logger.warn(
            { attempt: health.consecutiveFetchFailures, retryInMs: this.cooldownAfter(error), err: String(error) },
            "Reload failed, retrying after cooldown"
          );
        }
        return { kind: "fetch_failed", error };
      }

      return await this.process(snapshot);
    } finally {
      health.markLoopEnd();
      if (this.iterations % this.cfg.metricsLogEvery === 0) {
        metrics.log();
        logger.info(health.status(), "health");
      }
    }
  }

  private async process(snapshot: RawSnapshot): Promise<IterationResult> {
    const { normalizer, detector, dispatcher, persistence, metrics } = this.deps;

    const state = normalizer.normalize(snapshot);
    this.trackDegraded(state);
    const detection = detector.observe(state);

    switch (detection.kind) {
      case "baseline": {
        logger.info(
          { record: buildLogRecord(state, state.capturedAt, this.cfg.model), positions: state.positions.length },
          "Baseline captured"
        );
        await persistence.persistBaseline(state);
        return detection;
      }
      case "unchanged": {
        metrics.inc("unchanged");
        logger.info("No change");
        return detection;
      }
      case "changed": {
        const { event } = detection;
        metrics.inc("changes");
        logger.info(
          {
            pnlDelta: event.pnlDelta,
            aggregatePnl: event.current.aggregatePnl,
            positions: event.current.positions.length,
            record: buildLogRecord(event.current, event.detectedAt, this.cfg.model),
          },
          "⚡ Positions updated"
        );

        const started = nowMs();
        const summary = summarizeChange(event, this.cfg.model);
        const [sinks, persisted] = await Promise.all([dispatcher.dispatch(summary), persistence.persist(event)]);
        metrics.observe("dispatch_ms", elapsedMs(started));
        return { kind: "changed", event, sinks, persistence: persisted };
      }
    }
  }

  /** Warn once on entering the degraded (no positions parsed) state. */
  private trackDegraded(state: NormalizedState): void {
    const degraded = isDegraded(state);
    if (degraded && !this.degraded) {
      this.deps.metrics.inc("degraded");
      logger.warn(
        { sectionChars: state.sectionText.length },
        state.sectionText ? "No positions recognised in section text" : "No ACTIVE POSITIONS content detected"
      );
    }
    this.degraded = degraded;
  }
}
