/**
 * DiscoverySchedule - When the context loop should rescan
 *
 * Rescans often while agents are still starting up, then settles to a
 * slow interval.
 *
 *   0s ──5s──5s──5s── ... ──30s──────30s──────▶
 *   └──── warmup window ────┘└─── steady ───
 */

export interface DiscoveryScheduleConfig {
  warmupIntervalMs?: number;
  warmupWindowMs?: number;
  steadyIntervalMs?: number;
}

const DEFAULT_WARMUP_INTERVAL_MS = 5000;
const DEFAULT_WARMUP_WINDOW_MS = 30000;
const DEFAULT_STEADY_INTERVAL_MS = 30000;

export class DiscoverySchedule {
  private readonly warmupIntervalMs: number;
  private readonly warmupWindowMs: number;
  private readonly steadyIntervalMs: number;
  private startedAt: number;
  private lastRunAt: number | null = null;

  constructor(config: DiscoveryScheduleConfig = {}, startedAt: number = Date.now()) {
    this.warmupIntervalMs = config.warmupIntervalMs ?? DEFAULT_WARMUP_INTERVAL_MS;
    this.warmupWindowMs = config.warmupWindowMs ?? DEFAULT_WARMUP_WINDOW_MS;
    this.steadyIntervalMs = config.steadyIntervalMs ?? DEFAULT_STEADY_INTERVAL_MS;
    this.startedAt = startedAt;
  }

  intervalAt(now: number): number {
    return now - this.startedAt < this.warmupWindowMs ? this.warmupIntervalMs : this.steadyIntervalMs;
  }

  /** True when no scan has run yet or the current interval has elapsed */
  isDue(now: number): boolean {
    if (this.lastRunAt === null) return true;
    return now - this.lastRunAt >= this.intervalAt(now);
  }

  markRun(now: number): void {
    this.lastRunAt = now;
  }

  reset(startedAt: number): void {
    this.startedAt = startedAt;
    this.lastRunAt = null;
  }

  getLastRunAt(): number | null {
    return this.lastRunAt;
  }
}
