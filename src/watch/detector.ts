import { pnlDelta } from "./pnl.js";
import type { ChangeEvent, NormalizedState } from "./types.js";

export type DetectorPhase = "NO_BASELINE" | "TRACKING";

export type Detection =
  | { kind: "baseline"; state: NormalizedState }
  | { kind: "unchanged"; state: NormalizedState }
  | { kind: "changed"; event: ChangeEvent };

export interface ChangeDetectorOptions {
  /** Emit a change event (with `previous: null`) for the very first observation. */
  announceFirstObservation?: boolean;
}

/**
 * Owns the baseline: the last state accepted as current truth. Only a state
 * whose comparison key differs replaces it.
 */
export class ChangeDetector {
  private baseline: NormalizedState | null = null;

  constructor(private readonly opts: ChangeDetectorOptions = {}) {}

  get phase(): DetectorPhase {
    return this.baseline === null ? "NO_BASELINE" : "TRACKING";
  }

  get current(): NormalizedState | null {
    return this.baseline;
  }

  observe(state: NormalizedState, detectedAt: Date = new Date()): Detection {
    const previous = this.baseline;

    if (previous === null) {
      this.baseline = state;
      if (!this.opts.announceFirstObservation) return { kind: "baseline", state };
      return { kind: "changed", event: { previous: null, current: state, pnlDelta: null, detectedAt } };
    }

    if (previous.comparisonKey === state.comparisonKey) {
      return { kind: "unchanged", state: previous };
    }

    this.baseline = state;
    return {
      kind: "changed",
      event: {
        previous,
        current: state,
        pnlDelta: pnlDelta(previous.aggregatePnl, state.aggregatePnl),
        detectedAt,
      },
    };
  }
}
