#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { parseArgs, type ParsedArgs } from "./cliArgs.js";
import { loadSymbols, resolveOutputPaths } from "./config/load.js";
import { main, resolveConfig } from "./index.js";
import { createSource } from "./source/factory.js";
import { extractSection, htmlToText } from "./source/htmlText.js";
import { getDb, closeDb } from "./storage/db.js";
import { ChangeEventRepository } from "./storage/repositories.js";
import { formatSigned } from "./watch/pnl.js";
import { StateNormalizer } from "./watch/normalizer.js";
import { formatPlainTable, summarizeState } from "./watch/summary.js";

const VERSION = "1.0.0";

async function runCheck(args: ParsedArgs): Promise<void> {
  const cfg = resolveConfig(args.configPath, args.overrides);
  const source = createSource(cfg.source);
  const normalizer = new StateNormalizer({ symbols: loadSymbols(cfg) });

  const state = normalizer.normalize(await source.fetch());
  console.log(`\n${cfg.model} (${source.origin})\n`);
  console.log(formatPlainTable(summarizeState(state, cfg.model)));
  console.log(`\nComparison key (${state.comparisonKey.length} chars):\n${state.comparisonKey || "(empty)"}\n`);
}

async function runParse(args: ParsedArgs): Promise<void> {
  const file = args.positional[0];
  if (!file) throw new Error("Usage: position-watch parse <file>");

  const cfg = resolveConfig(args.configPath, args.overrides);
  const text = htmlToText(await readFile(file, "utf-8"));
  const section = extractSection(text, { marker: cfg.source.sectionMarker, endMarkers: cfg.source.sectionEndMarkers });
  const normalizer = new StateNormalizer({ symbols: loadSymbols(cfg) });

  const state = normalizer.normalize({ text: section || text, capturedAt: new Date(), origin: file });
  console.log(formatPlainTable(summarizeState(state, cfg.model)));
}

async function runHistory(args: ParsedArgs): Promise<void> {
  const limit = Number(args.positional[0]) || 20;
  const cfg = resolveConfig(args.configPath, args.overrides);
  const repo = new ChangeEventRepository(await getDb(resolveOutputPaths(cfg.output).dbFile));

  try {
    const rows = repo.getRecent(limit);
    if (rows.length === 0) {
      console.log("No change events recorded yet.");
      return;
    }
    for (const r of rows) {
      const total = r.aggregate_pnl === null ? "n/a" : formatSigned(r.aggregate_pnl);
      const delta = r.pnl_delta === null ? "n/a" : formatSigned(r.pnl_delta);
      console.log(`${r.detected_at}  ${r.model}  positions: ${r.position_count}  total: ${total}  Δ: ${delta}`);
    }
  } finally {
    closeDb();
  }
}

function printHelp(): void {
  console.log(`
position-watch: change alerts for a model's active positions page

Usage:
  position-watch run [options]          Start monitoring (default)
  position-watch check [options]        Fetch once, print parsed positions and exit
  position-watch parse <file>           Parse a saved page (HTML or text) offline
  position-watch history [limit]        Show recent change events (needs better-sqlite3)
  position-watch version | help

Alert options (combinable; default --notify):
  --notify       Desktop notification
  --sound        Sound alert
  --popup        Popup window with position details
  --visual       Coloured table in the terminal

Other options:
  --interval <s>   Poll interval in seconds (default 10)
  --cooldown <s>   Wait after a failed load in seconds (default 30)
  --url <url>      Page to watch
  --file <path>    Watch a page dump on disk instead of a URL
  --out <dir>      Directory for log, snapshots, latest view and database
  --config <path>  Config file (default ./config.json)

Environment:
  LOG_LEVEL, WATCH_CONFIG, WATCH_URL, WATCH_OUTPUT_DIR (also read from .env)
`);
}

async function run(argv: string[]): Promise<number> {
  const [cmd, ...rest] = argv;
  const command = cmd === undefined || cmd.startsWith("--") ? "run" : cmd;
  const args = parseArgs(command === cmd ? rest : argv);

  switch (command) {
    case "run":
      return main(args.configPath, args.overrides);
    case "check":
      await runCheck(args);
      return 0;
    case "parse":
      await runParse(args);
      return 0;
    case "history":
      await runHistory(args);
      return 0;
    case "version":
      console.log(`position-watch v${VERSION}`);
      return 0;
    case "help":
      printHelp();
      return 0;
    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      return 1;
  }
}

run(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
