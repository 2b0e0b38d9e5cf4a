import { SIMULATION_CONSTANTS } from '../constants/simulation.js';
import { FleetQueries } from '../domain/index.js';
import type { SimulationEngine } from '../simulation/engine.js';
import type { MetricsPublisher } from '../metrics/publisher.js';
import type { EntityStore } from '../store/entityStore.js';
import { describeError } from '../errors.js';

export interface TickSchedulerOptions {
  tickIntervalMs?: number;
  retryCooldownMs?: number;
  /** Clock for tick timestamps; defaults to wall time */
  now?: () => Date;
}

export type TickOutcome = { ok: true; timestamp: Date } | { ok: false; timestamp: Date; error: unknown };

/**
 * Periodic driver for live ticks.
 *
 * The first tick runs as soon as the scheduler starts. After a successful tick
 * the next one is scheduled a full interval later; after a failed tick the
 * error is logged and the next attempt comes after the cooldown instead.
 */
export class TickScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private isRunning = false;
  private readonly tickIntervalMs: number;
  private readonly retryCooldownMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly engine: SimulationEngine,
    private readonly publisher: MetricsPublisher,
    private readonly store: EntityStore,
    options: TickSchedulerOptions = {}
  ) {
    this.tickIntervalMs = options.tickIntervalMs ?? SIMULATION_CONSTANTS.TICK_INTERVAL_SECONDS * 1000;
    this.retryCooldownMs = options.retryCooldownMs ?? SIMULATION_CONSTANTS.RETRY_COOLDOWN_SECONDS * 1000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one combined step and publish its values. Never throws.
   */
  tick(): TickOutcome {
    const timestamp = this.now();
    try {
      const snapshot = this.engine.step(timestamp, this.tickIntervalMs / 1000);
      const result = this.publisher.publish(snapshot);
      const counts = FleetQueries.countByStatus(this.store.getState().vessels);
      console.log(
        `[TickScheduler] Tick ${timestamp.toISOString()}: ${result.gaugesSet} gauges, ` +
          `${result.countersIncremented} increments (underway ${counts.UNDERWAY}, in port ${counts.IN_PORT}, ` +
          `waiting ${counts.WAITING_BERTH}, anchored ${counts.AT_ANCHOR})`
      );
      return { ok: true, timestamp };
    } catch (error) {
      console.error(`[TickScheduler] Tick ${timestamp.toISOString()} failed: ${describeError(error)}`);
      return { ok: false, timestamp, error };
    }
  }

  start(): void {
    if (this.isRunning) {
      console.warn('[TickScheduler] Already running');
      return;
    }

    this.isRunning = true;
    this.runAndSchedule();
  }

  stop(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.isRunning = false;
  }

  isActive(): boolean {
    return this.isRunning;
  }

  private runAndSchedule(): void {
    const outcome = this.tick();
    if (!this.isRunning) {
      return;
    }

    const delay = outcome.ok ? this.tickIntervalMs : this.retryCooldownMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runAndSchedule();
    }, delay);
  }
}
