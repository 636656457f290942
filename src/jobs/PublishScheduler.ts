// src/jobs/PublishScheduler.ts
// Schedules badge publishing

import cron from "node-cron";
import type { PublishQueue } from "../modules/badges/badgePublisher.js";
import type { LedgerService } from "../modules/ledger/ledger.service.js";
import { ConfigurationError } from "../modules/ledger/ledger.errors.js";

// Account age and the updated-at stamp move at midnight UTC.
export const DAILY_REFRESH_CRON = "5 0 * * *";

export class PublishScheduler {
  private drainTask: ReturnType<typeof cron.schedule> | null = null;
  private dailyTask: ReturnType<typeof cron.schedule> | null = null;
  private isStarted: boolean = false;
  private lastDrainAt: Date | null = null;

  constructor(
    private readonly queue: PublishQueue,
    private readonly ledger: LedgerService,
    private readonly drainCron: string
  ) {
    if (!cron.validate(drainCron)) {
      throw new ConfigurationError(`Invalid PUBLISH_CRON expression "${drainCron}"`);
    }
  }

  start(): void {
    if (this.isStarted) {
      console.log(`[PublishScheduler] Already started, skipping`);
      return;
    }

    console.log(`[PublishScheduler] Starting publish scheduler...`);

    this.drainTask = cron.schedule(this.drainCron, async () => {
      try {
        await this.triggerDrain();
      } catch (err) {
        console.error(`[PublishScheduler] Drain failed:`, err);
      }
    }, { scheduled: false, timezone: "UTC" });

    this.dailyTask = cron.schedule(DAILY_REFRESH_CRON, async () => {
      try {
        await this.triggerDailyRefresh();
      } catch (err) {
        console.error(`[PublishScheduler] Daily refresh failed:`, err);
      }
    }, { scheduled: false, timezone: "UTC" });

    this.drainTask.start();
    this.dailyTask.start();

    this.isStarted = true;
    console.log(`[PublishScheduler] Publish scheduler started:`);
    console.log(`  - Drain: ${this.drainCron}`);
    console.log(`  - Daily refresh: ${DAILY_REFRESH_CRON} UTC`);
  }

  stop(): void {
    if (!this.isStarted) {
      console.log(`[PublishScheduler] Not started, nothing to stop`);
      return;
    }

    this.drainTask?.stop();
    this.drainTask = null;
    this.dailyTask?.stop();
    this.dailyTask = null;

    this.isStarted = false;
    console.log(`[PublishScheduler] Publish scheduler stopped`);
  }

  getStatus(): { isStarted: boolean; lastDrainAt: Date | null; pendingHunters: number } {
    return {
      isStarted: this.isStarted,
      lastDrainAt: this.lastDrainAt,
      pendingHunters: this.queue.pendingHunters().length,
    };
  }

  async triggerDrain(): Promise<void> {
    await this.queue.drain();
    this.lastDrainAt = new Date();
  }

  /** Re-enqueues every hunter so day-dependent documents are rebuilt. */
  async triggerDailyRefresh(): Promise<void> {
    console.log(`[PublishScheduler] Daily refresh of all badge documents...`);
    const hunters = await this.ledger.listHunters();
    this.queue.enqueue(hunters.map((h) => h.hunterId));
    this.queue.markGlobalDirty();
    await this.triggerDrain();
  }
}
