import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";
import type { SinkId } from "../notify/types.js";
import { ConfigSchema, EnvSchema, type Config, type Env, type OutputConfig } from "./schema.js";

const logger = createLogger("Config");

const DATA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "data");

/** Reads `.env` from the working directory into process.env (existing vars win), then validates. */
export function loadEnv(cwd: string = process.cwd()): Env {
  const envPath = path.join(cwd, ".env");
  if (fs.existsSync(envPath)) {
    const contents = fs.readFileSync(envPath, "utf-8");
    for (const line of contents.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const eqIdx = trimmed.indexOf("=");
      if (eqIdx === -1) continue;
      const key = trimmed.slice(0, eqIdx).trim();
      const value = trimmed.slice(eqIdx + 1).trim();
      if (key && !process.env[key]) {
        process.env[key] = value;
      }
    }
  }

  return EnvSchema.parse({
    LOG_LEVEL: process.env.LOG_LEVEL ?? "info",
    WATCH_CONFIG: process.env.WATCH_CONFIG,
    WATCH_URL: process.env.WATCH_URL,
    WATCH_OUTPUT_DIR: process.env.WATCH_OUTPUT_DIR,
  });
}

/**
 * Loads and validates config. An explicit path must exist; the default
 * `./config.json` may be absent, in which case every default applies.
 */
export function loadConfig(configPath?: string): Config {
  const resolved = configPath ?? path.join(process.cwd(), "config.json");
  if (!fs.existsSync(resolved)) {
    if (configPath) throw new Error(`Config file not found: ${resolved}`);
    logger.info({ path: resolved }, "No config file, using defaults");
    return ConfigSchema.parse({});
  }
  return ConfigSchema.parse(JSON.parse(fs.readFileSync(resolved, "utf-8")));
}

const SymbolsFileSchema = z.array(z.string().min(1)).min(1);

/** Tickers from config, else the bundled `data/symbols.json`. */
export function loadSymbols(cfg: Pick<Config, "symbols">, file = path.join(DATA_DIR, "symbols.json")): string[] {
  if (cfg.symbols) return cfg.symbols;
  return SymbolsFileSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
}

/* ---------- Command-line overrides ---------- */

export interface CliOverrides {
  sinks?: SinkId[];
  intervalSec?: number;
  cooldownSec?: number;
  url?: string;
  file?: string;
  outDir?: string;
}

/** Layers env and flags over file config (flags win) and re-validates. */
export function applyOverrides(cfg: Config, env: Env, cli: CliOverrides): Config {
  const { sectionMarker, sectionEndMarkers } = cfg.source;
  const url = cli.url ?? (cfg.source.kind === "http" ? env.WATCH_URL : undefined);

  let source: unknown = cfg.source;
  if (cli.file) {
    source = { kind: "file", path: cli.file, sectionMarker, sectionEndMarkers };
  } else if (url) {
    const base = cfg.source.kind === "http" ? cfg.source : { kind: "http", sectionMarker, sectionEndMarkers };
    source = { ...base, url };
  }

  const outDir = cli.outDir ?? env.WATCH_OUTPUT_DIR;

  return ConfigSchema.parse({
    ...cfg,
    source,
    sinks: cli.sinks && cli.sinks.length > 0 ? cli.sinks : cfg.sinks,
    pollIntervalMs: cli.intervalSec !== undefined ? Math.round(cli.intervalSec * 1000) : cfg.pollIntervalMs,
    retryCooldownMs: cli.cooldownSec !== undefined ? Math.round(cli.cooldownSec * 1000) : cfg.retryCooldownMs,
    output: outDir ? { ...cfg.output, dir: outDir } : cfg.output,
  });
}

export interface OutputPaths {
  logFile: string;
  snapshotDir: string;
  latestViewFile: string;
  dbFile: string;
}

export function resolveOutputPaths(output: OutputConfig, cwd: string = process.cwd()): OutputPaths {
  const dir = path.resolve(cwd, output.dir);
  return {
    logFile: path.resolve(dir, output.logFile),
    snapshotDir: path.resolve(dir, output.snapshotDir),
    latestViewFile: path.resolve(dir, output.latestViewFile),
    dbFile: path.resolve(dir, output.dbFile),
  };
}
