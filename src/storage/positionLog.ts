import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { isoSeconds } from "../utils/time.js";
import type { NormalizedState } from "../watch/types.js";

/** One line of the position log, in its on-disk key order. */
export const LogRecordSchema = z.object({
  timestamp: z.string(),
  model: z.string(),
  active_positions: z.string(),
});

export type LogRecord = z.infer<typeof LogRecordSchema>;

export function buildLogRecord(state: NormalizedState, at: Date, model: string): LogRecord {
  return {
    timestamp: isoSeconds(at),
    model,
    active_positions: state.sectionText,
  };
}

/** Append-only JSON-lines file; each record goes out in a single write. */
export class PositionLog {
  constructor(readonly path: string) {}

  async append(record: LogRecord): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, `${JSON.stringify(record)}\n`, "utf-8");
  }

  async readAll(): Promise<LogRecord[]> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    return content
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => LogRecordSchema.parse(JSON.parse(line)));
  }
}
