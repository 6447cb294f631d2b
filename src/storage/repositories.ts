import type Database from "better-sqlite3";
import { isoSeconds } from "../utils/time.js";
import type { ChangeEvent } from "../watch/types.js";

export interface ChangeEventRow {
  id: number;
  detected_at: string;
  model: string;
  comparison_key: string;
  positions: string;
  position_count: number;
  aggregate_pnl: number | null;
  pnl_delta: number | null;
  created_at: string;
}

/** Queryable history of detected changes, one row per event. */
export class ChangeEventRepository {
  private db: Database.Database;
  private insertStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.db = db;
    this.insertStmt = this.db.prepare(`
      INSERT INTO change_events (detected_at, model, comparison_key, positions, position_count, aggregate_pnl, pnl_delta)
      VALUES (@detected_at, @model, @comparison_key, @positions, @position_count, @aggregate_pnl, @pnl_delta)
    `);
  }

  insert(event: ChangeEvent, model: string): number {
    const info = this.insertStmt.run({
      detected_at: isoSeconds(event.detectedAt),
      model,
      comparison_key: event.current.comparisonKey,
      positions: JSON.stringify(event.current.positions),
      position_count: event.current.positions.length,
      aggregate_pnl: event.current.aggregatePnl,
      pnl_delta: event.pnlDelta,
    });
    return Number(info.lastInsertRowid);
  }

  getRecent(limit = 20): ChangeEventRow[] {
    return this.db
      .prepare("SELECT * FROM change_events ORDER BY id DESC LIMIT ?")
      .all(limit) as ChangeEventRow[];
  }

  count(model?: string): number {
    const row = (
      model === undefined
        ? this.db.prepare("SELECT COUNT(*) as cnt FROM change_events").get()
        : this.db.prepare("SELECT COUNT(*) as cnt FROM change_events WHERE model = ?").get(model)
    ) as { cnt: number };
    return row.cnt;
  }
}
