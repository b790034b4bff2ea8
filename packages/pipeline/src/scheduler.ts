/**
 * @txrelay/pipeline — Reconcile scheduler.
 *
 * Runs reconcile passes on an interval. The next pass is scheduled only
 * after the previous one settles, so passes never overlap.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ReconcileReport } from "./reconciler.js";

export interface Pollable {
  poll(): Promise<ReconcileReport>;
}

export interface ReconcileSchedulerOptions {
  /** Delay between the end of one pass and the start of the next. Default: 15000 */
  readonly intervalMs?: number | undefined;
  readonly logger?: Logger | undefined;
}

export class ReconcileScheduler {
  private readonly target: Pollable;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private running = false;
  private current: Promise<void> | undefined;

  constructor(target: Pollable, options: ReconcileSchedulerOptions = {}) {
    this.target = target;
    this.intervalMs = options.intervalMs ?? 15_000;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info({ intervalMs: this.intervalMs }, "Reconcile scheduler started");
    this.schedule();
  }

  /** Stop scheduling and wait for a pass in progress. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.current;
    this.logger.info("Reconcile scheduler stopped");
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.current = this.tick().finally(() => {
        this.current = undefined;
        if (this.running) this.schedule();
      });
    }, this.intervalMs);
  }

  private async tick(): Promise<void> {
    try {
      const report = await this.target.poll();
      this.logger.debug(report, "Scheduled reconcile pass");
    } catch (err) {
      this.logger.error({ err }, "Scheduled reconcile pass failed");
    }
  }
}
