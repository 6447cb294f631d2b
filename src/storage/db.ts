import type Database from "better-sqlite3";
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("DB");

const __dirname = dirname(fileURLToPath(import.meta.url));

let _db: Database.Database | null = null;

/**
 * better-sqlite3 is an optional dependency: it is loaded only when change
 * history is enabled.
 */
async function loadDriver(): Promise<typeof Database> {
  try {
    const mod = await import("better-sqlite3");
    return mod.default;
  } catch (err) {
    throw new Error(`Change history needs the optional better-sqlite3 package: ${String(err)}`, { cause: err });
  }
}

/** Opens a database and applies the schema. `":memory:"` works for tests. */
export async function openDb(dbPath: string): Promise<Database.Database> {
  const Driver = await loadDriver();
  const db = new Driver(dbPath);
  db.pragma("journal_mode = WAL");

  const sql = readFileSync(resolve(__dirname, "migrations.sql"), "utf-8");
  db.exec(sql);
  return db;
}

export async function getDb(dbPath = "./positions.db"): Promise<Database.Database> {
  if (_db) return _db;

  _db = await openDb(dbPath);
  logger.info({ dbPath }, "Database initialized");
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
    logger.info("Database closed");
  }
}
