import { describe, it, expect } from "vitest";
import { Metrics } from "../src/monitoring/metrics.js";
import { NotificationDispatcher } from "../src/notify/dispatcher.js";
import { createSinks, resolveSinkIds } from "../src/notify/factory.js";
import { RecordingSink, summaryFixture } from "./helpers.js";

describe("NotificationDispatcher", () => {
  it("delivers the same summary to every sink", async () => {
    const desktop = new RecordingSink("desktop");
    const table = new RecordingSink("table");
    const dispatcher = new NotificationDispatcher([desktop, table], { sinkTimeoutMs: 1000 });
    const summary = summaryFixture();

    const outcomes = await dispatcher.dispatch(summary);

    expect(outcomes.map((o) => [o.sinkId, o.ok])).toEqual([
      ["desktop", true],
      ["table", true],
    ]);
    expect(desktop.received).toEqual([summary]);
    expect(table.received).toEqual([summary]);
  });

  it("isolates a failing sink", async () => {
    const metrics = new Metrics();
    const desktop = new RecordingSink("desktop", "throw");
    const sound = new RecordingSink("sound");
    const table = new RecordingSink("table");
    const dispatcher = new NotificationDispatcher([desktop, sound, table], { sinkTimeoutMs: 1000 }, metrics);

    const outcomes = await dispatcher.dispatch(summaryFixture());

    expect(outcomes[0]).toMatchObject({ sinkId: "desktop", ok: false, timedOut: false, error: "Error: desktop is broken" });
    expect(outcomes[1].ok).toBe(true);
    expect(outcomes[2].ok).toBe(true);
    expect(sound.received).toHaveLength(1);
    expect(table.received).toHaveLength(1);
    expect(metrics.getCounter("sink_failures")).toBe(1);
  });

  it("times out a hanging sink and aborts its signal", async () => {
    const popup = new RecordingSink("popup", "hang");
    const table = new RecordingSink("table");
    const dispatcher = new NotificationDispatcher([popup, table], { sinkTimeoutMs: 20 });

    const outcomes = await dispatcher.dispatch(summaryFixture());

    expect(outcomes[0]).toMatchObject({ sinkId: "popup", ok: false, timedOut: true, error: "SinkTimeoutError: timed out after 20ms" });
    expect(outcomes[1].ok).toBe(true);
    expect(popup.aborted).toBe(true);
  });

  it("lists its sink ids", () => {
    const dispatcher = new NotificationDispatcher(createSinks(["table", "sound"]), { sinkTimeoutMs: 100 });
    expect(dispatcher.sinkIds).toEqual(["table", "sound"]);
  });
});

describe("resolveSinkIds", () => {
  it("falls back to the desktop notification", () => {
    expect(resolveSinkIds([])).toEqual(["desktop"]);
  });

  it("de-duplicates in first-seen order", () => {
    expect(resolveSinkIds(["table", "sound", "table"])).toEqual(["table", "sound"]);
  });
});
