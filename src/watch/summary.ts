import { formatSigned } from "./pnl.js";
import type { ChangeEvent, NormalizedState, PositionEntry } from "./types.js";

export interface SummaryRow {
  symbol: string;
  side: string;
  leverage: string;
  entry: string;
  pnl: number | null;
  pnlText: string;
}

/** What every notification sink receives; each renders the subset it suits. */
export interface RenderedSummary {
  title: string;
  headline: string;
  model: string;
  rows: SummaryRow[];
  total: number | null;
  pnlDelta: number | null;
  detectedAt: Date;
}

export function toRow(p: PositionEntry): SummaryRow {
  return {
    symbol: p.symbol,
    side: p.side === "UNKNOWN" ? "" : p.side[0] + p.side.slice(1).toLowerCase(),
    leverage: p.leverage ?? "",
    entry: p.entryPrice ? `$${p.entryPrice}` : "",
    pnl: p.unrealizedPnl,
    pnlText: p.pnlText ?? "N/A",
  };
}

/** Display order: highest P&L first, unknown P&L last, page order among ties. */
export function byPnlDescending(a: SummaryRow, b: SummaryRow): number {
  if (a.pnl === null || b.pnl === null) return (a.pnl === null ? 1 : 0) - (b.pnl === null ? 1 : 0);
  return b.pnl - a.pnl;
}

export function headlineFor(pnlDelta: number | null): string {
  return pnlDelta === null ? "Active positions changed" : `Δ Unrealized P&L: ${formatSigned(pnlDelta)}`;
}

export function summarizeState(state: NormalizedState, model: string, at: Date = state.capturedAt): RenderedSummary {
  return {
    title: `${model} positions`,
    headline: state.positions.length ? `${state.positions.length} active position(s)` : "No active positions",
    model,
    rows: state.positions.map(toRow).sort(byPnlDescending),
    total: state.aggregatePnl,
    pnlDelta: null,
    detectedAt: at,
  };
}

export function summarizeChange(event: ChangeEvent, model: string): RenderedSummary {
  return {
    title: `${model} positions updated`,
    headline: headlineFor(event.pnlDelta),
    model,
    rows: event.current.positions.map(toRow).sort(byPnlDescending),
    total: event.current.aggregatePnl,
    pnlDelta: event.pnlDelta,
    detectedAt: event.detectedAt,
  };
}

/* ---------- Plain-text table ---------- */

export const TABLE_HEADERS = ["Symbol", "Side", "Leverage", "Entry Price", "Unrealized P&L"] as const;

export function rowCells(row: SummaryRow): string[] {
  return [row.symbol, row.side, row.leverage, row.entry, row.pnlText];
}

export function totalCells(total: number): string[] {
  return ["TOTAL", "", "", "", formatSigned(total)];
}

/**
 * Fixed-width table used by the popup and any plain-text medium:
 *
 *   Symbol  Side   Leverage  Entry Price  Unrealized P&L
 *   ------  -----  --------  -----------  --------------
 *   ETH     Short  20X       $3,100       -$12.50
 */
export function formatPlainTable(summary: RenderedSummary): string {
  if (summary.rows.length === 0) return "Unable to parse positions";

  const body = summary.rows.map(rowCells);
  if (summary.total !== null) body.push(totalCells(summary.total));

  const widths = TABLE_HEADERS.map((h, i) => Math.max(h.length, ...body.map((r) => r[i].length)));
  const fmt = (cells: readonly string[]): string =>
    cells.map((c, i) => c.padEnd(widths[i])).join("  ").trimEnd();

  const lines = [fmt(TABLE_HEADERS), fmt(widths.map((w) => "-".repeat(w)))];
  for (const r of body) lines.push(fmt(r));
  if (summary.pnlDelta !== null) lines.push("", headlineFor(summary.pnlDelta));
  return lines.join("\n");
}
