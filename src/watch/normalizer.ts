import type { RawSnapshot } from "../source/types.js";
import { parseMoney, sumPnl } from "./pnl.js";
import type { NormalizedState, PositionEntry, PositionSide } from "./types.js";

/* ---------- Structured position cards ("Entry Time: … Side: … Unrealized P&L: …") ---------- */

const ENTRY_TIME = /Entry Time:\s*\d{1,2}:\d{2}:\d{2}/gi;
const CARD_SIDE = /Side:\s*(LONG|SHORT)\b/i;
const CARD_ENTRY_PRICE = /Entry Price:\s*\$?\s*([0-9][0-9,]*(?:\.[0-9]+)?)/i;
const CARD_LEVERAGE = /Leverage:\s*(\d+(?:\.\d+)?)\s*X/i;
const CARD_PNL = /Unreali[sz]ed P&L:\s*([+\-\u2212]?\s*\$?\s*[+\-\u2212]?\s*[0-9][0-9,]*(?:\.[0-9]+)?)/i;

/* ---------- Free-form lines ("ETH short 20x entry 3,100 (pnl -12.5)") ---------- */

const LINE_SIDE = /\b(long|short)\b/i;
const LINE_LEVERAGE = /(?<![\w.])(\d+(?:\.\d+)?)\s*x\b/i;
const LINE_ENTRY_PRICE = /\bentry(?:\s*price)?\s*[:@]?\s*\$?\s*([0-9][0-9,]*(?:\.[0-9]+)?)/i;
const LINE_PNL =
  /\b(?:unreali[sz]ed\s+)?(?:p&l|pnl|p\/l)\s*[:=]?\s*([+\-\u2212]?\s*\$?\s*[+\-\u2212]?\s*[0-9][0-9,]*(?:\.[0-9]+)?)/i;

interface FieldPatterns {
  side: RegExp;
  leverage: RegExp;
  entryPrice: RegExp;
  pnl: RegExp;
}

const CARD_FIELDS: FieldPatterns = {
  side: CARD_SIDE,
  leverage: CARD_LEVERAGE,
  entryPrice: CARD_ENTRY_PRICE,
  pnl: CARD_PNL,
};

const LINE_FIELDS: FieldPatterns = {
  side: LINE_SIDE,
  leverage: LINE_LEVERAGE,
  entryPrice: LINE_ENTRY_PRICE,
  pnl: LINE_PNL,
};

export interface NormalizerOptions {
  /** Tickers recognised as position symbols. */
  symbols: readonly string[];
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Turns a section snapshot into a comparable state. Unrecognised content gives
 * a degraded state (no positions, empty key) instead of an error.
 */
export class StateNormalizer {
  private readonly symbolPattern: RegExp | null;

  constructor(opts: NormalizerOptions) {
    const tickers = [...new Set(opts.symbols.map((s) => s.trim().toUpperCase()).filter(Boolean))]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);
    this.symbolPattern = tickers.length
      ? new RegExp(`(?<![A-Z0-9])(${tickers.join("|")})(?![A-Z0-9])`)
      : null;
  }

  normalize(snapshot: RawSnapshot): NormalizedState {
    const sectionText = snapshot.text.trim();
    const positions = this.extractPositions(sectionText);

    return {
      comparisonKey: positions.map((p) => p.line).join("\n"),
      positions,
      aggregatePnl: sumPnl(positions.map((p) => p.unrealizedPnl)),
      capturedAt: snapshot.capturedAt,
      sectionText,
    };
  }

  extractPositions(text: string): PositionEntry[] {
    if (!text) return [];
    const cards = splitCards(text);
    const chunks = cards.length > 0 ? cards : text.split("\n");
    const fields = cards.length > 0 ? CARD_FIELDS : LINE_FIELDS;

    const entries: PositionEntry[] = [];
    for (const chunk of chunks) {
      const entry = this.parseEntry(chunk, fields);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  private parseEntry(chunk: string, fields: FieldPatterns): PositionEntry | null {
    const symbol = this.symbolPattern?.exec(chunk.toUpperCase())?.[1];
    if (!symbol) return null;

    const sideMatch = fields.side.exec(chunk);
    const pnlMatch = fields.pnl.exec(chunk);
    if (!sideMatch && !pnlMatch) return null;

    const leverageMatch = fields.leverage.exec(chunk);
    const entryMatch = fields.entryPrice.exec(chunk);
    const pnlText = pnlMatch ? pnlMatch[1].replace(/\s+/g, "").replace(/\u2212/g, "-") : null;

    return Object.freeze({
      symbol,
      side: sideMatch ? toSide(sideMatch[1]) : "UNKNOWN",
      leverage: leverageMatch ? `${leverageMatch[1]}X` : null,
      entryPrice: entryMatch ? entryMatch[1] : null,
      unrealizedPnl: pnlText === null ? null : parseMoney(pnlText),
      pnlText,
      line: collapse(chunk),
    });
  }
}

function toSide(word: string): PositionSide {
  const upper = word.toUpperCase();
  return upper === "LONG" || upper === "SHORT" ? upper : "UNKNOWN";
}

/** Position cards start at each "Entry Time: hh:mm:ss". */
function splitCards(text: string): string[] {
  const starts = [...text.matchAll(ENTRY_TIME)].map((m) => m.index ?? 0);
  return starts.map((start, i) => text.slice(start, starts[i + 1] ?? text.length));
}
