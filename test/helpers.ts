import type { Sink, SinkId } from "../src/notify/types.js";
import type { RenderedSummary } from "../src/watch/summary.js";
import type { NormalizedState } from "../src/watch/types.js";

export const T0 = new Date("2025-10-21T08:15:02.345Z");

/** A state with the given key and aggregate; positions are irrelevant to the detector. */
export function stateOf(key: string, aggregatePnl: number | null, capturedAt: Date = T0): NormalizedState {
  return { comparisonKey: key, positions: [], aggregatePnl, capturedAt, sectionText: key };
}

export function summaryFixture(overrides: Partial<RenderedSummary> = {}): RenderedSummary {
  return {
    title: "TEST positions updated",
    headline: "Δ Unrealized P&L: +15.00",
    model: "TEST",
    rows: [{ symbol: "ETH", side: "Short", leverage: "", entry: "", pnl: 10, pnlText: "10.0" }],
    total: 10,
    pnlDelta: 15,
    detectedAt: T0,
    ...overrides,
  };
}

export type SinkBehaviour = "ok" | "throw" | "hang";

/** Sink double that records every summary it receives. */
export class RecordingSink implements Sink {
  readonly received: RenderedSummary[] = [];
  aborted = false;

  constructor(
    readonly id: SinkId,
    private readonly behaviour: SinkBehaviour = "ok"
  ) {}

  async notify(summary: RenderedSummary, signal: AbortSignal): Promise<void> {
    this.received.push(summary);
    if (this.behaviour === "throw") throw new Error(`${this.id} is broken`);
    if (this.behaviour === "hang") {
      await new Promise<void>((resolve) => {
        signal.addEventListener("abort", () => {
          this.aborted = true;
          resolve();
        });
      });
    }
  }
}
