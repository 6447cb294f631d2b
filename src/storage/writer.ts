import { createLogger } from "../utils/logger.js";
import type { Metrics } from "../monitoring/metrics.js";
import { summarizeChange, summarizeState } from "../watch/summary.js";
import type { ChangeEvent, NormalizedState } from "../watch/types.js";
import type { LatestViewWriter } from "./latestView.js";
import { buildLogRecord, type PositionLog } from "./positionLog.js";
import type { ChangeEventRepository } from "./repositories.js";
import type { SnapshotWriter } from "./svgSnapshot.js";

const logger = createLogger("Persistence");

export type PersistenceTarget = "log" | "snapshot" | "latestView" | "history";

export type PersistenceOutcome =
  | { target: PersistenceTarget; ok: true }
  | { target: PersistenceTarget; ok: false; error: string };

export interface PersistenceTargets {
  log: PositionLog;
  snapshots?: SnapshotWriter;
  latestView?: LatestViewWriter;
  history?: ChangeEventRepository;
}

/**
 * Best-effort durability: every target is written independently and a failure
 * in one never stops the others. Never rejects.
 */
export class PersistenceWriter {
  constructor(
    private readonly targets: PersistenceTargets,
    private readonly model: string,
    private readonly metrics?: Metrics
  ) {}

  async persist(event: ChangeEvent): Promise<PersistenceOutcome[]> {
    const { log, snapshots, latestView, history } = this.targets;
    const summary = summarizeChange(event, this.model);

    const jobs: Promise<PersistenceOutcome>[] = [
      this.attempt("log", () => log.append(buildLogRecord(event.current, event.detectedAt, this.model))),
    ];
    if (snapshots) jobs.push(this.attempt("snapshot", () => snapshots.write(summary)));
    if (latestView) jobs.push(this.attempt("latestView", () => latestView.write(summary)));
    if (history) jobs.push(this.attempt("history", async () => history.insert(event, this.model)));

    return Promise.all(jobs);
  }

  /** Cold-start capture: image and latest view only, no log record. */
  async persistBaseline(state: NormalizedState): Promise<PersistenceOutcome[]> {
    const { snapshots, latestView } = this.targets;
    const summary = summarizeState(state, this.model);

    const jobs: Promise<PersistenceOutcome>[] = [];
    if (snapshots) jobs.push(this.attempt("snapshot", () => snapshots.write(summary)));
    if (latestView) jobs.push(this.attempt("latestView", () => latestView.write(summary)));
    return Promise.all(jobs);
  }

  private async attempt(target: PersistenceTarget, write: () => Promise<unknown>): Promise<PersistenceOutcome> {
    try {
      await write();
      return { target, ok: true };
    } catch (err) {
      this.metrics?.inc("persistence_failures");
      logger.error({ target, err: String(err) }, "Persistence write failed");
      return { target, ok: false, error: String(err) };
    }
  }
}
