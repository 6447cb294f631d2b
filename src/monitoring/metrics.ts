/**
 * In-process counters and timings for the watch loop, logged periodically.
 */
import { createLogger } from "../utils/logger.js";

const logger = createLogger("Metrics");

export type CounterName =
  | "polls"
  | "fetch_failures"
  | "changes"
  | "unchanged"
  | "degraded"
  | "sink_failures"
  | "persistence_failures";

export type TimingName = "fetch_ms" | "dispatch_ms";

export class Metrics {
  private counters = new Map<CounterName, number>();
  private timings = new Map<TimingName, number[]>();
  private startTime = Date.now();

  /* ---- Counters ---- */

  inc(name: CounterName, delta = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
  }

  getCounter(name: CounterName): number {
    return this.counters.get(name) ?? 0;
  }

  /* ---- Timings (last 500 samples) ---- */

  observe(name: TimingName, value: number): void {
    const arr = this.timings.get(name) ?? [];
    arr.push(value);
    if (arr.length > 500) arr.shift();
    this.timings.set(name, arr);
  }

  percentile(name: TimingName, p: number): number {
    const arr = this.timings.get(name);
    if (!arr || arr.length === 0) return 0;
    const sorted = [...arr].sort((a, b) => a - b);
    const idx = Math.min(Math.ceil((p / 100) * sorted.length) - 1, sorted.length - 1);
    return sorted[Math.max(0, idx)];
  }

  /* ---- Snapshot ---- */

  snapshot(): Record<string, number> {
    const snap: Record<string, number> = {
      uptimeMs: Date.now() - this.startTime,
    };

    for (const [k, v] of this.counters) snap[k] = v;
    for (const [k] of this.timings) {
      snap[`${k}.p50`] = this.percentile(k, 50);
      snap[`${k}.p95`] = this.percentile(k, 95);
    }

    return snap;
  }

  log(): void {
    logger.info(this.snapshot(), "metrics");
  }
}
