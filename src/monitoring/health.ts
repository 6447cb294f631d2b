import { createLogger } from "../utils/logger.js";

const logger = createLogger("Health");

export interface HealthStatus {
  uptimeHuman: string;
  lastLoopMs: number;
  sinceLastSuccessMs: number | null;
  consecutiveFetchFailures: number;
  healthy: boolean;
  checks: Record<string, boolean>;
}

/**
 * Liveness of the poll loop: iteration timing and how long the source has
 * been unreachable.
 */
export class HealthMonitor {
  private startTime = Date.now();
  private lastLoopStart = 0;
  private lastLoopEnd = 0;
  private lastSuccessAt: number | null = null;
  private consecutiveFailures = 0;

  /** @param staleAfterMs a loop that has not started within this window is unhealthy */
  constructor(private readonly staleAfterMs: number) {}

  markLoopStart(): void {
    this.lastLoopStart = Date.now();
  }

  markLoopEnd(): void {
    this.lastLoopEnd = Date.now();
  }

  markFetch(ok: boolean): void {
    if (ok) {
      this.lastSuccessAt = Date.now();
      this.consecutiveFailures = 0;
    } else {
      this.consecutiveFailures++;
    }
  }

  get consecutiveFetchFailures(): number {
    return this.consecutiveFailures;
  }

  status(): HealthStatus {
    const now = Date.now();
    const uptime = now - this.startTime;
    const hours = Math.floor(uptime / 3_600_000);
    const mins = Math.floor((uptime % 3_600_000) / 60_000);

    const checks: Record<string, boolean> = {
      loopRunning: this.lastLoopStart > 0 && now - this.lastLoopStart < this.staleAfterMs,
      sourceReachable: this.consecutiveFailures === 0,
    };
    const healthy = Object.values(checks).every(Boolean);

    if (!healthy) {
      logger.warn({ checks, consecutiveFailures: this.consecutiveFailures }, "Unhealthy status");
    }

    return {
      uptimeHuman: `${hours}h ${mins}m`,
      lastLoopMs: this.lastLoopEnd >= this.lastLoopStart ? this.lastLoopEnd - this.lastLoopStart : 0,
      sinceLastSuccessMs: this.lastSuccessAt === null ? null : now - this.lastSuccessAt,
      consecutiveFetchFailures: this.consecutiveFailures,
      healthy,
      checks,
    };
  }
}
