import type { LedgerConfig } from "../src/config/ledgerConfig.js";
import { PublishScheduler } from "../src/jobs/PublishScheduler.js";
import {
  BadgeDocumentStore,
  DocumentStoreTarget,
  FileSystemTarget,
  PublishQueue,
  type PublishReport,
  type PublishTarget,
} from "../src/modules/badges/badgePublisher.js";
import { LeaderboardService } from "../src/modules/leaderboards/leaderboard.renderer.js";
import { PgLedgerStore } from "../src/modules/ledger/ledger.pgStore.js";
import { LedgerService } from "../src/modules/ledger/ledger.service.js";
import { MemoryLedgerStore, type LedgerStore } from "../src/modules/ledger/ledger.store.js";
import { createDatabase } from "./db.js";

export interface AppContext {
  config: LedgerConfig;
  ledger: LedgerService;
  leaderboard: LeaderboardService;
  documents: BadgeDocumentStore;
  queue: PublishQueue;
  scheduler: PublishScheduler;
  close(): Promise<void>;
}

export interface AppContextOverrides {
  store?: LedgerStore;
  clock?: () => Date;
}

/**
 * Wires the ledger, read models and publisher. Throws ConfigurationError
 * for malformed tables or a bad cron expression.
 */
export function createAppContext(config: LedgerConfig, overrides: AppContextOverrides = {}): AppContext {
  let store = overrides.store;
  let closeDatabase: (() => Promise<void>) | null = null;

  if (!store) {
    if (config.databaseUrl) {
      const { db, pool } = createDatabase(config.databaseUrl);
      store = new PgLedgerStore(db);
      closeDatabase = () => pool.end();
      console.log("[Server] Using Postgres ledger store");
    } else {
      store = new MemoryLedgerStore();
      console.warn("[Server] DATABASE_URL not set, using in-memory ledger store (state is lost on restart)");
    }
  }

  const ledger = new LedgerService({ store, clock: overrides.clock });
  const leaderboard = new LeaderboardService(ledger);
  const documents = new BadgeDocumentStore();

  const targets: PublishTarget[] = [new DocumentStoreTarget(documents)];
  if (config.badgeOutputDir) {
    targets.push(new FileSystemTarget(config.badgeOutputDir));
    console.log(`[Server] Mirroring badge documents to ${config.badgeOutputDir}`);
  }

  // Without the scheduler every commit triggers its own drain
  const queue = new PublishQueue({
    ledger,
    targets,
    retry: config.publishRetry,
    clock: overrides.clock,
    autoDrain: !config.schedulerEnabled,
  });
  const detach = queue.attach();
  const scheduler = new PublishScheduler(queue, ledger, config.publishCron);

  return {
    config,
    ledger,
    leaderboard,
    documents,
    queue,
    scheduler,
    async close() {
      if (scheduler.getStatus().isStarted) scheduler.stop();
      detach();
      if (closeDatabase) await closeDatabase();
    },
  };
}

/**
 * Startup pass: brings cached hunters in line with the current tables and
 * badge registry, then publishes every hunter and the global documents.
 */
export async function publishExistingLedger(ctx: AppContext): Promise<PublishReport> {
  const hunters = await ctx.ledger.listHunters();
  ctx.queue.enqueue(hunters.map((h) => h.hunterId));
  ctx.queue.markGlobalDirty();
  await ctx.ledger.recomputeAll();
  return ctx.queue.drain();
}
