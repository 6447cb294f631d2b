import { Decimal } from "decimal.js";

/**
 * Change in aggregate unrealized P&L between two observations. Exact decimal
 * arithmetic, so 340.25 − (−120.5) is 460.75 rather than a float artefact.
 * Null whenever either side is unknown.
 */
export function pnlDelta(previous: number | null, current: number | null): number | null {
  if (previous === null || current === null) return null;
  return new Decimal(current).minus(previous).toNumber();
}

/** Sum of the known values, or null when none is known. */
export function sumPnl(values: Iterable<number | null>): number | null {
  let sum = new Decimal(0);
  let seen = false;
  for (const v of values) {
    if (v === null) continue;
    sum = sum.plus(v);
    seen = true;
  }
  return seen ? sum.toNumber() : null;
}

/**
 * Parses a displayed money figure: "+$1,234.56", "-$ 12", "$-3.5", "10.0".
 * Returns null for anything that is not a finite number.
 */
export function parseMoney(text: string): number | null {
  const compact = text.replace(/[\s$,]/g, "").replace(/\u2212/g, "-");
  const match = /^([+-]?)(\d+(?:\.\d+)?)$/.exec(compact);
  if (!match) return null;
  const value = Number(match[2]);
  if (!Number.isFinite(value)) return null;
  return match[1] === "-" ? -value : value;
}

export function formatSigned(value: number, digits = 2): string {
  return `${value >= 0 ? "+" : "-"}${Math.abs(value).toFixed(digits)}`;
}
