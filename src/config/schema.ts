import { z } from "zod";
import { SINK_IDS } from "../notify/types.js";

/* ---------- Page source ---------- */

const SectionFields = {
  sectionMarker: z.string().min(1).default("ACTIVE POSITIONS"),
  sectionEndMarkers: z.array(z.string().min(1)).default(["COMPLETED TRADES", "MODELCHAT"]),
};

export const HttpSourceSchema = z.object({
  kind: z.literal("http"),
  url: z.string().url().default("https://nof1.ai/models/deepseek-chat-v3.1"),
  timeoutMs: z.number().int().min(1000).default(60_000),
  userAgent: z.string().optional(),
  ...SectionFields,
});

export const FileSourceSchema = z.object({
  kind: z.literal("file"),
  path: z.string().min(1),
  ...SectionFields,
});

export const SourceSchema = z.discriminatedUnion("kind", [HttpSourceSchema, FileSourceSchema]);

export type HttpSourceConfig = z.infer<typeof HttpSourceSchema>;
export type FileSourceConfig = z.infer<typeof FileSourceSchema>;
export type SourceConfig = z.infer<typeof SourceSchema>;

/* ---------- Output files ---------- */

export const OutputSchema = z.object({
  dir: z.string().default("."),
  logFile: z.string().default("positions-log.txt"),
  snapshotDir: z.string().default("positions_snapshots"),
  latestViewFile: z.string().default("positions_latest.html"),
  dbFile: z.string().default("positions.db"),
  snapshots: z.boolean().default(true),
  latestView: z.boolean().default(true),
  history: z.boolean().default(false), // needs the optional better-sqlite3 package
});

export type OutputConfig = z.infer<typeof OutputSchema>;

/* ---------- Main config schema ---------- */

export const SinkIdSchema = z.enum(SINK_IDS);

export const ConfigSchema = z.object({
  model: z.string().min(1).default("DEEPSEEK CHAT V3.1"),
  source: SourceSchema.default({ kind: "http" }),

  /* ---- Scheduling ---- */
  pollIntervalMs: z.number().int().min(1000).default(10_000),
  retryCooldownMs: z.number().int().min(1000).default(30_000),
  startupMaxAttempts: z.number().int().min(0).default(0), // 0 = keep trying

  /* ---- Detection ---- */
  announceFirstObservation: z.boolean().default(false),
  symbols: z.array(z.string().min(1)).min(1).optional(), // replaces data/symbols.json

  /* ---- Notification ---- */
  sinks: z.array(SinkIdSchema).default([]), // empty = desktop only
  sinkTimeoutMs: z.number().int().min(100).default(10_000),

  output: OutputSchema.default({}),
  metricsLogEvery: z.number().int().min(1).default(60),
});

export type Config = z.infer<typeof ConfigSchema>;

/* ---------- Environment schema ---------- */

export const EnvSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  WATCH_CONFIG: z.string().optional(),
  WATCH_URL: z.string().url().optional(),
  WATCH_OUTPUT_DIR: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;
