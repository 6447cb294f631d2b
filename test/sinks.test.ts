import { Writable } from "node:stream";
import { describe, it, expect, vi } from "vitest";
import { DesktopSink, type DesktopMessage } from "../src/notify/desktop.js";
import { PopupSink, dialogCommand, popupBody, type DialogCommand } from "../src/notify/popup.js";
import { SoundSink, soundCommands, type Command } from "../src/notify/sound.js";
import { TableSink, renderBoxTable } from "../src/notify/table.js";
import { summaryFixture } from "./helpers.js";

function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _enc, cb) {
      chunks.push(String(chunk));
      cb();
    },
  });
  return { stream, text: () => chunks.join("") };
}

describe("DesktopSink", () => {
  it("sends the title and headline", async () => {
    const sent: DesktopMessage[] = [];
    const sink = new DesktopSink(async (msg) => {
      sent.push(msg);
    });

    await sink.notify(summaryFixture());

    expect(sent).toEqual([{ title: "TEST positions updated", message: "Δ Unrealized P&L: +15.00", timeout: 5 }]);
  });

  it("propagates backend failures", async () => {
    const sink = new DesktopSink(() => Promise.reject(new Error("no notification daemon")));
    await expect(sink.notify(summaryFixture())).rejects.toThrow("no notification daemon");
  });
});

describe("SoundSink", () => {
  it("stops at the first player that works", async () => {
    const bell = capture();
    const run = vi.fn((_cmd: Command, _signal: AbortSignal) => Promise.resolve());
    const sink = new SoundSink({ platform: "linux", run, bell: bell.stream });

    await sink.notify(summaryFixture(), new AbortController().signal);

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0].file).toBe("paplay");
    expect(bell.text()).toBe("");
  });

  it("rings the terminal bell when every player fails", async () => {
    const bell = capture();
    const run = vi.fn((_cmd: Command, _signal: AbortSignal) => Promise.reject(new Error("ENOENT")));
    const sink = new SoundSink({ platform: "linux", run, bell: bell.stream });

    await sink.notify(summaryFixture(), new AbortController().signal);

    expect(run.mock.calls.map((c) => c[0].file)).toEqual(["paplay", "aplay"]);
    expect(bell.text()).toBe("\u0007");
  });

  it("stays silent once its call has been aborted", async () => {
    const bell = capture();
    const controller = new AbortController();
    const run = vi.fn((_cmd: Command, _signal: AbortSignal) => {
      controller.abort();
      return Promise.reject(new Error("killed"));
    });
    const sink = new SoundSink({ platform: "darwin", run, bell: bell.stream });

    await sink.notify(summaryFixture(), controller.signal);

    expect(run).toHaveBeenCalledTimes(1);
    expect(bell.text()).toBe("");
  });

  it("has no player on unknown platforms", () => {
    expect(soundCommands("aix")).toEqual([]);
    expect(soundCommands("darwin")[0].file).toBe("afplay");
  });
});

describe("PopupSink", () => {
  it("launches zenity with the table on linux", async () => {
    const launched: DialogCommand[] = [];
    const sink = new PopupSink(async (cmd) => {
      launched.push(cmd);
    }, "linux");

    await sink.notify(summaryFixture());

    expect(launched).toHaveLength(1);
    expect(launched[0].file).toBe("zenity");
    expect(launched[0].args).toContain("--title=TEST positions updated");
    expect(launched[0].args).toContain(`--text=${popupBody(summaryFixture())}`);
  });

  it("rejects on a platform without a dialog program", async () => {
    const sink = new PopupSink(() => Promise.resolve(), "aix");
    await expect(sink.notify(summaryFixture())).rejects.toThrow("No dialog program for platform aix");
  });

  it("passes title and body as data, not script", () => {
    const mac = dialogCommand("darwin", "T\"itle", "B'ody");
    expect(mac?.args.slice(-2)).toEqual(["T\"itle", "B'ody"]);

    const win = dialogCommand("win32", "T", "B");
    expect(win?.env).toEqual({ POPUP_TITLE: "T", POPUP_BODY: "B" });
  });

  it("builds the body from the headline and the plain table", () => {
    const lines = popupBody(summaryFixture()).split("\n");
    expect(lines.slice(0, 5)).toEqual([
      "Δ Unrealized P&L: +15.00",
      "",
      "Current positions:",
      "",
      "Symbol  Side   Leverage  Entry Price  Unrealized P&L",
    ]);
  });
});

describe("renderBoxTable", () => {
  it("draws a boxed table with a total row", () => {
    const lines = renderBoxTable(summaryFixture()).split("\n");

    expect(lines[0]).toBe("⚡ TEST positions updated");
    expect(lines[2]).toBe("│ Symbol │ Side  │ Leverage │ Entry Price │ Unrealized P&L │");
    expect(lines[4]).toBe("│ ETH    │ Short │" + " ".repeat(10) + "│" + " ".repeat(13) + "│" + " ".repeat(11) + "10.0 │");
    expect(lines[6]).toBe("│ TOTAL  │       │" + " ".repeat(10) + "│" + " ".repeat(13) + "│" + " ".repeat(9) + "+10.00 │");
    expect(lines[lines.length - 1]).toBe("Δ Unrealized P&L: +15.00");
  });

  it("colours P&L cells when asked", () => {
    const out = renderBoxTable(summaryFixture(), true);
    expect(out).toContain("\u001b[32m          10.0\u001b[0m");
  });
});

describe("TableSink", () => {
  it("writes the table without colour to a non-terminal stream", async () => {
    const out = capture();
    await new TableSink(out.stream).notify(summaryFixture());
    expect(out.text()).toBe(`\n${renderBoxTable(summaryFixture())}\n\n`);
  });

  it("says so when nothing was parsed", async () => {
    const out = capture();
    await new TableSink(out.stream).notify(summaryFixture({ rows: [] }));
    expect(out.text()).toBe("\nTEST positions updated: no positions could be parsed\n\n");
  });
});
