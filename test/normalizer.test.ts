import { describe, it, expect } from "vitest";
import type { RawSnapshot } from "../src/source/types.js";
import { StateNormalizer } from "../src/watch/normalizer.js";

const normalizer = new StateNormalizer({ symbols: ["BTC", "ETH", "SOL", "OP", "NEAR"] });

function snap(text: string): RawSnapshot {
  return { text, capturedAt: new Date("2025-01-01T00:00:00Z"), origin: "test" };
}

const CARDS = [
  "Total unrealized: $999",
  "Entry Time: 10:15:02",
  "Side: LONG",
  "Coin: BTC",
  "Leverage: 20X",
  "Entry Price: $65,000.5",
  "Unrealized P&L: +$120.25",
  "Entry Time: 11:00:00",
  "Side: SHORT",
  "Coin: SOL",
  "Leverage: 10X",
  "Entry Price: $150",
  "Unrealized P&L: -$20.25",
].join("\n");

describe("StateNormalizer — free-form lines", () => {
  it("extracts a one-line position", () => {
    const state = normalizer.normalize(snap("ETH short 2.4 (pnl 10.0)"));

    expect(state.positions).toEqual([
      {
        symbol: "ETH",
        side: "SHORT",
        leverage: null,
        entryPrice: null,
        unrealizedPnl: 10,
        pnlText: "10.0",
        line: "ETH short 2.4 (pnl 10.0)",
      },
    ]);
    expect(state.comparisonKey).toBe("ETH short 2.4 (pnl 10.0)");
    expect(state.aggregatePnl).toBe(10);
    expect(state.sectionText).toBe("ETH short 2.4 (pnl 10.0)");
  });

  it("reads leverage, entry price and signed dollar P&L", () => {
    const state = normalizer.normalize(
      snap("Updated 12:00:01\nBTC LONG 20x entry $65,000 P&L +$12.50\nETH short (pnl -2.5)")
    );

    expect(state.positions.map((p) => [p.symbol, p.side, p.leverage, p.entryPrice, p.unrealizedPnl])).toEqual([
      ["BTC", "LONG", "20X", "65,000", 12.5],
      ["ETH", "SHORT", null, null, -2.5],
    ]);
    expect(state.aggregatePnl).toBe(10);
    expect(state.comparisonKey).toBe("BTC LONG 20x entry $65,000 P&L +$12.50\nETH short (pnl -2.5)");
  });

  it("ignores noise lines outside positions", () => {
    const a = normalizer.normalize(snap("Updated 12:00:01\nETH short (pnl -2.5)"));
    const b = normalizer.normalize(snap("Updated 12:00:11\nETH short (pnl -2.5)"));
    expect(a.comparisonKey).toBe(b.comparisonKey);
  });

  it("collapses whitespace so layout-only differences share a key", () => {
    const a = normalizer.normalize(snap("ETH short 2.4 (pnl 10.0)"));
    const b = normalizer.normalize(snap("\n  ETH   short\t2.4 (pnl 10.0)  \n"));
    expect(b.comparisonKey).toBe(a.comparisonKey);
  });

  it("requires a symbol", () => {
    const state = normalizer.normalize(snap("long the market (pnl 5)"));
    expect(state.positions).toEqual([]);
  });

  it("does not match a ticker inside a longer word", () => {
    const state = normalizer.normalize(snap("STOP loss long (pnl 4)"));
    expect(state.positions).toEqual([]);
  });

  it("requires a side or a P&L figure next to the symbol", () => {
    const state = normalizer.normalize(snap("BTC dominance 55%"));
    expect(state.positions).toEqual([]);
  });

  it("keeps page order", () => {
    const state = normalizer.normalize(snap("SOL long (pnl 1)\nBTC short (pnl 50)\nETH long (pnl -3)"));
    expect(state.positions.map((p) => p.symbol)).toEqual(["SOL", "BTC", "ETH"]);
  });

  it("leaves P&L null when absent but keeps the entry", () => {
    const state = normalizer.normalize(snap("ETH long 5x"));
    expect(state.positions).toHaveLength(1);
    expect(state.positions[0].unrealizedPnl).toBeNull();
    expect(state.positions[0].leverage).toBe("5X");
    expect(state.aggregatePnl).toBeNull();
  });
});

describe("StateNormalizer — position cards", () => {
  it("splits cards at Entry Time and reads labelled fields", () => {
    const state = normalizer.normalize(snap(CARDS));

    expect(state.positions).toHaveLength(2);
    expect(state.positions[0]).toMatchObject({
      symbol: "BTC",
      side: "LONG",
      leverage: "20X",
      entryPrice: "65,000.5",
      unrealizedPnl: 120.25,
      pnlText: "+$120.25",
    });
    expect(state.positions[1]).toMatchObject({
      symbol: "SOL",
      side: "SHORT",
      leverage: "10X",
      entryPrice: "150",
      unrealizedPnl: -20.25,
      pnlText: "-$20.25",
    });
    expect(state.aggregatePnl).toBe(100);
    expect(state.positions[0].line).toBe(
      "Entry Time: 10:15:02 Side: LONG Coin: BTC Leverage: 20X Entry Price: $65,000.5 Unrealized P&L: +$120.25"
    );
  });

  it("keeps header text out of the key", () => {
    const a = normalizer.normalize(snap(CARDS));
    const b = normalizer.normalize(snap(CARDS.replace("$999", "$1,001")));
    expect(b.comparisonKey).toBe(a.comparisonKey);
  });

  it("drops cards without a recognised symbol", () => {
    const state = normalizer.normalize(snap("Entry Time: 09:00:00\nSide: LONG\nUnrealized P&L: $5"));
    expect(state.positions).toEqual([]);
  });
});

describe("StateNormalizer — degraded input", () => {
  it.each(["", "   ", "<<<garbage>>>", "Nothing to see here"])("returns an empty state for %j", (text) => {
    const state = normalizer.normalize(snap(text));
    expect(state.positions).toEqual([]);
    expect(state.comparisonKey).toBe("");
    expect(state.aggregatePnl).toBeNull();
  });
});

describe("StateNormalizer — idempotence", () => {
  it("yields the same state for the same snapshot", () => {
    const raw = snap(CARDS);
    const a = normalizer.normalize(raw);
    const b = normalizer.normalize(raw);
    expect(b.comparisonKey).toBe(a.comparisonKey);
    expect(b.aggregatePnl).toBe(a.aggregatePnl);
    expect(b).toEqual(a);
  });

  it("produces frozen entries", () => {
    const state = normalizer.normalize(snap("ETH short 2.4 (pnl 10.0)"));
    expect(Object.isFrozen(state.positions[0])).toBe(true);
  });
});
