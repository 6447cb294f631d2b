export type PositionSide = "LONG" | "SHORT" | "UNKNOWN";

export interface PositionEntry {
  readonly symbol: string;
  readonly side: PositionSide;
  /** As displayed, e.g. "20X". */
  readonly leverage: string | null;
  /** As displayed without "$", e.g. "3,412.5". */
  readonly entryPrice: string | null;
  readonly unrealizedPnl: number | null;
  /** P&L as displayed, e.g. "-$12.40". */
  readonly pnlText: string | null;
  /** Whitespace-collapsed source text of the position; part of the comparison key. */
  readonly line: string;
}

export interface NormalizedState {
  /** Canonical text compared byte-for-byte between polls. */
  readonly comparisonKey: string;
  readonly positions: readonly PositionEntry[];
  readonly aggregatePnl: number | null;
  readonly capturedAt: Date;
  /** Trimmed section text, recorded verbatim in the position log. */
  readonly sectionText: string;
}

export interface ChangeEvent {
  readonly previous: NormalizedState | null;
  readonly current: NormalizedState;
  readonly pnlDelta: number | null;
  readonly detectedAt: Date;
}

export function isDegraded(state: NormalizedState): boolean {
  return state.positions.length === 0;
}
