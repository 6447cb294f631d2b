import { displayTime } from "../utils/time.js";
import { formatSigned } from "../watch/pnl.js";
import { headlineFor, type RenderedSummary } from "../watch/summary.js";
import { writeFileAtomic } from "./atomic.js";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}

function pnlClass(value: number | null): string {
  if (value === null) return "";
  return value >= 0 ? "profit" : "loss";
}

const STYLE = `
body { font-family: system-ui, -apple-system, "Segoe UI", Roboto, Arial, sans-serif; max-width: 900px; margin: 20px auto; padding: 20px; }
h2 { color: #333; }
table { border-collapse: collapse; width: 100%; margin: 20px 0; }
td, th { border: 1px solid #ddd; padding: 8px 12px; text-align: left; }
th { background: #f5f5f5; }
.profit { color: #28a745; font-weight: bold; }
.loss { color: #dc3545; font-weight: bold; }
.empty { color: #666; font-style: italic; }`;

export function renderLatestHtml(summary: RenderedSummary): string {
  const rows = summary.rows
    .map(
      (r) =>
        `<tr><td>${escapeHtml(r.symbol)}</td><td>${escapeHtml(r.side)}</td><td>${escapeHtml(r.leverage)}</td>` +
        `<td>${escapeHtml(r.entry)}</td><td class="${pnlClass(r.pnl)}">${escapeHtml(r.pnlText)}</td></tr>`
    )
    .join("\n");

  const total =
    summary.total === null
      ? ""
      : `<p><strong>Total P&amp;L:</strong> <span class="${pnlClass(summary.total)}">${formatSigned(summary.total)}</span></p>`;
  const delta = summary.pnlDelta === null ? "" : `<p>${escapeHtml(headlineFor(summary.pnlDelta))}</p>`;

  return `<!DOCTYPE html>
<html><head><meta charset="utf-8"><title>${escapeHtml(summary.model)} Positions</title>
<style>${STYLE}
</style>
</head><body>
<h2>${escapeHtml(summary.model)} Active Positions</h2>
<p><small>Last updated: ${displayTime(summary.detectedAt)}</small></p>
<table>
<thead>
<tr><th>Symbol</th><th>Side</th><th>Leverage</th><th>Entry Price</th><th>Unrealized P&amp;L</th></tr>
</thead>
<tbody>
${rows || '<tr><td colspan="5" class="empty">No positions could be parsed</td></tr>'}
</tbody>
</table>
${total}
${delta}
</body></html>
`;
}

/** Single human-viewable file, overwritten with the newest state. */
export class LatestViewWriter {
  constructor(readonly path: string) {}

  async write(summary: RenderedSummary): Promise<void> {
    await writeFileAtomic(this.path, renderLatestHtml(summary));
  }
}
