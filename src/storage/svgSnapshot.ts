import { join } from "node:path";
import { displayTime, fileStamp } from "../utils/time.js";
import { TABLE_HEADERS, headlineFor, rowCells, totalCells, type RenderedSummary } from "../watch/summary.js";
import { writeFileAtomic } from "./atomic.js";
import { escapeHtml } from "./latestView.js";

const CHAR_W = 8.4;
const ROW_H = 24;
const PAD = 16;
const COL_GAP = 24;

const PROFIT = "#28a745";
const LOSS = "#dc3545";
const INK = "#222";

function pnlFill(value: number | null): string {
  if (value === null) return INK;
  return value >= 0 ? PROFIT : LOSS;
}

/** Renders the position table as a standalone SVG image. */
export function renderSvg(summary: RenderedSummary): string {
  const body = summary.rows.map((r) => ({ cells: rowCells(r), pnl: r.pnl }));
  if (summary.total !== null) body.push({ cells: totalCells(summary.total), pnl: summary.total });

  const widths = TABLE_HEADERS.map((h, i) => Math.max(h.length, ...body.map((r) => r.cells[i].length)) * CHAR_W);
  const xs = widths.map((_, i) => PAD + widths.slice(0, i).reduce((a, w) => a + w + COL_GAP, 0));
  const width = Math.ceil(xs[xs.length - 1] + widths[widths.length - 1] + PAD);

  const lines: string[] = [];
  let y = PAD + ROW_H;
  lines.push(`<text x="${PAD}" y="${y}" font-weight="bold" font-size="16">${escapeHtml(summary.title)}</text>`);
  y += ROW_H;
  lines.push(
    `<text x="${PAD}" y="${y}" fill="#666">${escapeHtml(`${displayTime(summary.detectedAt)} · ${headlineFor(summary.pnlDelta)}`)}</text>`
  );
  y += ROW_H * 1.5;

  TABLE_HEADERS.forEach((h, i) => {
    lines.push(`<text x="${xs[i]}" y="${y}" font-weight="bold">${escapeHtml(h)}</text>`);
  });
  lines.push(`<line x1="${PAD}" y1="${y + 6}" x2="${width - PAD}" y2="${y + 6}" stroke="#ddd"/>`);

  if (body.length === 0) {
    y += ROW_H;
    lines.push(`<text x="${PAD}" y="${y}" fill="#666">No positions could be parsed</text>`);
  }
  for (const row of body) {
    y += ROW_H;
    row.cells.forEach((cell, i) => {
      const fill = i === row.cells.length - 1 ? pnlFill(row.pnl) : INK;
      lines.push(`<text x="${xs[i]}" y="${y}" fill="${fill}">${escapeHtml(cell)}</text>`);
    });
  }

  const height = Math.ceil(y + PAD);
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}"` +
      ` font-family="Menlo, Consolas, monospace" font-size="14">`,
    `<rect width="100%" height="100%" fill="#fff"/>`,
    ...lines,
    `</svg>`,
    "",
  ].join("\n");
}

/** One image per change, named by detection time at second resolution. */
export class SnapshotWriter {
  constructor(readonly dir: string) {}

  pathFor(at: Date): string {
    return join(this.dir, `positions_${fileStamp(at)}.svg`);
  }

  async write(summary: RenderedSummary): Promise<string> {
    const path = this.pathFor(summary.detectedAt);
    await writeFileAtomic(path, renderSvg(summary));
    return path;
  }
}
