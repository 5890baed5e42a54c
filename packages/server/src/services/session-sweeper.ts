/**
 * Session sweeper - reclaims expired and closed sessions on a fixed period
 */

import type { Logger } from "pino";
import type { SessionRegistry } from "./session-registry.js";

export interface SweeperConfig {
  intervalMs: number; // default: 5 minutes
}

export class SessionSweeper {
  private intervalId: NodeJS.Timeout | null = null;
  private running = false;

  // Metrics
  private totalSweeps = 0;
  private totalRemoved = 0;
  private lastSweepTime = 0;

  constructor(
    private registry: SessionRegistry,
    private config: SweeperConfig,
    private log: Logger
  ) {}

  /**
   * Start the periodic sweep
   */
  start(): void {
    if (this.running) {
      this.log.warn("Session sweeper already running");
      return;
    }

    this.running = true;
    this.log.info(
      { intervalMinutes: Math.round(this.config.intervalMs / 1000 / 60) },
      "Starting session sweeper"
    );

    this.intervalId = setInterval(() => {
      this.runSweep();
    }, this.config.intervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.running = false;
    this.log.info("Session sweeper stopped");
  }

  /**
   * Sweep once. Never throws: a failing sweep is logged and the next period
   * tries again.
   * @returns number of sessions removed
   */
  runSweep(): number {
    try {
      const removed = this.registry.sweepExpired();
      this.totalSweeps++;
      this.totalRemoved += removed;
      this.lastSweepTime = Date.now();

      this.log.debug({ removed }, "Session sweep completed");
      return removed;
    } catch (err) {
      this.log.error({ err }, "Session sweep failed");
      return 0;
    }
  }

  getMetrics() {
    return {
      totalSweeps: this.totalSweeps,
      totalRemoved: this.totalRemoved,
      lastSweepTime: this.lastSweepTime,
      running: this.running,
    };
  }
}
