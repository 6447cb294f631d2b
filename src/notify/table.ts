import { TABLE_HEADERS, headlineFor, rowCells, totalCells, type RenderedSummary } from "../watch/summary.js";
import type { Sink } from "./types.js";

const GREEN = "\u001b[32m";
const RED = "\u001b[31m";
const BOLD = "\u001b[1m";
const RESET = "\u001b[0m";

function paint(text: string, code: string, enabled: boolean): string {
  return enabled ? `${code}${text}${RESET}` : text;
}

function pnlColour(value: number | null): string {
  if (value === null) return "";
  return value >= 0 ? GREEN : RED;
}

/**
 * Boxed terminal table:
 *
 *   ┌────────┬──────┬──────────┬─────────────┬────────────────┐
 *   │ Symbol │ Side │ Leverage │ Entry Price │ Unrealized P&L │
 *   ├────────┼──────┼──────────┼─────────────┼────────────────┤
 */
export function renderBoxTable(summary: RenderedSummary, colour = false): string {
  const rows = summary.rows.map((r) => ({ cells: rowCells(r), pnl: r.pnl }));
  const total = summary.total !== null ? { cells: totalCells(summary.total), pnl: summary.total } : null;
  const all = [...rows, ...(total ? [total] : [])];

  const widths = TABLE_HEADERS.map((h, i) => Math.max(h.length, ...all.map((r) => r.cells[i].length)));
  const rule = (l: string, m: string, r: string): string => l + widths.map((w) => "─".repeat(w + 2)).join(m) + r;
  const line = (cells: readonly string[], pnl: number | null = null, bold = false): string => {
    const padded = cells.map((c, i) => {
      const text = i === cells.length - 1 || i === 3 ? c.padStart(widths[i]) : c.padEnd(widths[i]);
      if (i === cells.length - 1 && pnl !== null) return paint(text, pnlColour(pnl), colour);
      return bold ? paint(text, BOLD, colour) : text;
    });
    return `│ ${padded.join(" │ ")} │`;
  };

  const out = [
    paint(`⚡ ${summary.title}`, BOLD, colour),
    rule("┌", "┬", "┐"),
    line(TABLE_HEADERS, null, true),
    rule("├", "┼", "┤"),
    ...rows.map((r) => line(r.cells, r.pnl)),
  ];
  if (total) {
    out.push(rule("├", "┼", "┤"), line(total.cells, total.pnl, true));
  }
  out.push(rule("└", "┴", "┘"));
  if (summary.pnlDelta !== null) out.push(headlineFor(summary.pnlDelta));
  return out.join("\n");
}

/** Prints the full position table to a terminal stream. */
export class TableSink implements Sink {
  readonly id = "table" as const;

  constructor(private readonly out: NodeJS.WritableStream & { isTTY?: boolean } = process.stdout) {}

  async notify(summary: RenderedSummary): Promise<void> {
    if (summary.rows.length === 0) {
      this.out.write(`\n${summary.title}: no positions could be parsed\n\n`);
      return;
    }
    const colour = this.out.isTTY === true;
    this.out.write(`\n${renderBoxTable(summary, colour)}\n\n`);
  }
}
