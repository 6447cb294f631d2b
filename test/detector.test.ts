import { describe, it, expect } from "vitest";
import { ChangeDetector } from "../src/watch/detector.js";
import { T0, stateOf } from "./helpers.js";

describe("ChangeDetector", () => {
  it("starts without a baseline", () => {
    const detector = new ChangeDetector();
    expect(detector.phase).toBe("NO_BASELINE");
    expect(detector.current).toBeNull();
  });

  it("adopts the first observation silently", () => {
    const detector = new ChangeDetector();
    const first = stateOf("ETH short", 10);

    const detection = detector.observe(first);

    expect(detection).toEqual({ kind: "baseline", state: first });
    expect(detector.phase).toBe("TRACKING");
    expect(detector.current).toBe(first);
  });

  it("reports unchanged for an identical key and keeps the first baseline", () => {
    const detector = new ChangeDetector();
    const first = stateOf("ETH short", 10);
    detector.observe(first);

    const detection = detector.observe(stateOf("ETH short", 10));

    expect(detection.kind).toBe("unchanged");
    expect(detector.current).toBe(first);
  });

  it("emits exactly one event when the key differs", () => {
    const detector = new ChangeDetector();
    const first = stateOf("ETH short (pnl 10.0)", 10);
    const second = stateOf("ETH short (pnl 25.0)", 25);
    detector.observe(first);

    const detection = detector.observe(second, T0);

    expect(detection).toEqual({
      kind: "changed",
      event: { previous: first, current: second, pnlDelta: 15, detectedAt: T0 },
    });
    expect(detector.current).toBe(second);
    expect(detector.observe(stateOf("ETH short (pnl 25.0)", 25)).kind).toBe("unchanged");
  });

  it("treats a single-character difference as a change", () => {
    const detector = new ChangeDetector();
    detector.observe(stateOf("BTC long 20X", null));
    expect(detector.observe(stateOf("BTC long 25X", null)).kind).toBe("changed");
  });

  it("ignores the aggregate when keys match", () => {
    const detector = new ChangeDetector();
    detector.observe(stateOf("same", 1));
    expect(detector.observe(stateOf("same", 2)).kind).toBe("unchanged");
  });

  it("leaves the delta null when either aggregate is unknown", () => {
    const detector = new ChangeDetector();
    detector.observe(stateOf("a", null));
    const detection = detector.observe(stateOf("b", 5));
    expect(detection.kind === "changed" && detection.event.pnlDelta).toBeNull();
  });

  it("counts losing every position as a change", () => {
    const detector = new ChangeDetector();
    detector.observe(stateOf("ETH short", 10));
    const detection = detector.observe(stateOf("", null));
    expect(detection.kind).toBe("changed");
  });

  it("can announce the first observation", () => {
    const detector = new ChangeDetector({ announceFirstObservation: true });
    const first = stateOf("ETH short", 10);

    const detection = detector.observe(first, T0);

    expect(detection).toEqual({
      kind: "changed",
      event: { previous: null, current: first, pnlDelta: null, detectedAt: T0 },
    });
    expect(detector.current).toBe(first);
  });
});
