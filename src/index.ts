import { applyOverrides, loadConfig, loadEnv, loadSymbols, resolveOutputPaths, type CliOverrides } from "./config/load.js";
import type { Config } from "./config/schema.js";
import { PollLoop, StartupError } from "./engine/pollLoop.js";
import { HealthMonitor } from "./monitoring/health.js";
import { Metrics } from "./monitoring/metrics.js";
import { NotificationDispatcher } from "./notify/dispatcher.js";
import { createSinks } from "./notify/factory.js";
import { createSource } from "./source/factory.js";
import { closeDb, getDb } from "./storage/db.js";
import { LatestViewWriter } from "./storage/latestView.js";
import { PositionLog } from "./storage/positionLog.js";
import { ChangeEventRepository } from "./storage/repositories.js";
import { SnapshotWriter } from "./storage/svgSnapshot.js";
import { PersistenceWriter } from "./storage/writer.js";
import { createLogger, setLogLevel } from "./utils/logger.js";
import { ChangeDetector } from "./watch/detector.js";
import { StateNormalizer } from "./watch/normalizer.js";

const logger = createLogger("Main");

/** Env + config file + flags, validated. */
export function resolveConfig(configPath: string | undefined, overrides: CliOverrides): Config {
  const env = loadEnv();
  setLogLevel(env.LOG_LEVEL);
  return applyOverrides(loadConfig(configPath ?? env.WATCH_CONFIG), env, overrides);
}

export interface Watcher {
  loop: PollLoop;
  dispatcher: NotificationDispatcher;
  metrics: Metrics;
  close(): void;
}

/** Wires every component of the monitor from a validated config. */
export async function buildWatcher(cfg: Config): Promise<Watcher> {
  const paths = resolveOutputPaths(cfg.output);
  const metrics = new Metrics();
  const health = new HealthMonitor(cfg.pollIntervalMs + cfg.retryCooldownMs + 120_000);

  let history: ChangeEventRepository | undefined;
  if (cfg.output.history) {
    try {
      history = new ChangeEventRepository(await getDb(paths.dbFile));
    } catch (err) {
      logger.warn({ err: String(err) }, "DB init failed, running without change history");
    }
  }

  const persistence = new PersistenceWriter(
    {
      log: new PositionLog(paths.logFile),
      snapshots: cfg.output.snapshots ? new SnapshotWriter(paths.snapshotDir) : undefined,
      latestView: cfg.output.latestView ? new LatestViewWriter(paths.latestViewFile) : undefined,
      history,
    },
    cfg.model,
    metrics
  );

  const dispatcher = new NotificationDispatcher(createSinks(cfg.sinks), { sinkTimeoutMs: cfg.sinkTimeoutMs }, metrics);

  const loop = new PollLoop(
    {
      source: createSource(cfg.source),
      normalizer: new StateNormalizer({ symbols: loadSymbols(cfg) }),
      detector: new ChangeDetector({ announceFirstObservation: cfg.announceFirstObservation }),
      dispatcher,
      persistence,
      metrics,
      health,
    },
    {
      model: cfg.model,
      pollIntervalMs: cfg.pollIntervalMs,
      retryCooldownMs: cfg.retryCooldownMs,
      startupMaxAttempts: cfg.startupMaxAttempts,
      metricsLogEvery: cfg.metricsLogEvery,
    }
  );

  return { loop, dispatcher, metrics, close: closeDb };
}

/**
 * Runs the monitor until SIGINT/SIGTERM. Returns the process exit code:
 * 0 after a graceful stop, 1 when the source is unreachable at startup.
 */
export async function main(configPath: string | undefined, overrides: CliOverrides): Promise<number> {
  const cfg = resolveConfig(configPath, overrides);
  const paths = resolveOutputPaths(cfg.output);
  const watcher = await buildWatcher(cfg);

  logger.info(
    {
      model: cfg.model,
      source: cfg.source.kind === "http" ? cfg.source.url : cfg.source.path,
      pollIntervalMs: cfg.pollIntervalMs,
      retryCooldownMs: cfg.retryCooldownMs,
      sinks: watcher.dispatcher.sinkIds,
      logFile: paths.logFile,
      snapshots: cfg.output.snapshots ? paths.snapshotDir : null,
    },
    "Position monitor starting"
  );

  /* ---- Graceful shutdown ---- */
  const controller = new AbortController();
  const shutdown = (sig: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.warn({ signal: sig }, "Second signal, exiting immediately");
      process.exit(1);
    }
    logger.info({ signal: sig }, "Shutting down after the current iteration…");
    controller.abort();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  try {
    await watcher.loop.run(controller.signal);
    return 0;
  } catch (err) {
    if (err instanceof StartupError) {
      logger.error({ err: err.message }, "Startup failed");
      return 1;
    }
    throw err;
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
    watcher.close();
  }
}
