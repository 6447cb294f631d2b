import type { RenderedSummary } from "../watch/summary.js";

/** The closed set of notification channels. */
export const SINK_IDS = ["desktop", "sound", "popup", "table"] as const;
export type SinkId = (typeof SINK_IDS)[number];

export const DEFAULT_SINKS: readonly SinkId[] = ["desktop"];

/**
 * A notification channel. `notify` resolves once the alert has been handed to
 * its medium and rejects on failure; it should stop work when `signal` aborts.
 */
export interface Sink {
  readonly id: SinkId;
  notify(summary: RenderedSummary, signal: AbortSignal): Promise<void>;
}

export type SinkOutcome =
  | { sinkId: SinkId; ok: true; elapsedMs: number }
  | { sinkId: SinkId; ok: false; elapsedMs: number; timedOut: boolean; error: string };
