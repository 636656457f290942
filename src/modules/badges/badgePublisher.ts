// src/modules/badges/badgePublisher.ts
// Decoupled badge publishing: ledger commits enqueue hunters, drain() publishes with retry

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import pRetry from "p-retry";
import type { PublishRetryConfig } from "../../config/ledgerConfig.js";
import { renderLeaderboard } from "../leaderboards/leaderboard.renderer.js";
import { PublishFailureError } from "../ledger/ledger.errors.js";
import type { LedgerService, PublishView } from "../ledger/ledger.service.js";
import type { Award, HunterState } from "../ledger/ledger.types.js";
import {
  buildGlobalDocuments,
  buildHunterDocuments,
  serializeBadgeDocument,
  type BadgeDocumentEntry,
} from "./badgeDocuments.js";

export const GLOBAL_GROUP = "global";

export function hunterGroup(hunterId: string): string {
  return `hunter:${hunterId}`;
}

/**
 * Destination for badge documents. A group is replaced as a whole: keys
 * that were in the previous publish of the group and are missing now are
 * removed.
 */
export interface PublishTarget {
  readonly name: string;
  publishGroup(group: string, entries: BadgeDocumentEntry[]): Promise<void>;
}

// ============================================================================
// DOCUMENT STORE (served over HTTP)
// ============================================================================

export class BadgeDocumentStore {
  private readonly groups = new Map<string, string[]>();
  private readonly documents = new Map<string, string>();

  replaceGroup(group: string, entries: BadgeDocumentEntry[]): void {
    for (const key of this.groups.get(group) ?? []) {
      this.documents.delete(key);
    }
    for (const entry of entries) {
      this.documents.set(entry.key, serializeBadgeDocument(entry.document));
    }
    this.groups.set(group, entries.map((e) => e.key));
  }

  get(key: string): string | undefined {
    return this.documents.get(key);
  }

  keys(): string[] {
    return [...this.documents.keys()].sort();
  }

  get size(): number {
    return this.documents.size;
  }
}

export class DocumentStoreTarget implements PublishTarget {
  readonly name = "document-store";

  constructor(private readonly store: BadgeDocumentStore) {}

  async publishGroup(group: string, entries: BadgeDocumentEntry[]): Promise<void> {
    this.store.replaceGroup(group, entries);
  }
}

// ============================================================================
// FILESYSTEM MIRROR
// ============================================================================

/**
 * Mirrors documents to disk for static hosting. Each file is replaced
 * atomically, but a group is not: a reader can briefly see a mix of old and
 * new files of one hunter. The HTTP document store is the surface that swaps
 * a group at once. A group whose files cannot all be staged is left as it
 * was.
 */
export class FileSystemTarget implements PublishTarget {
  readonly name = "filesystem";
  private readonly written = new Map<string, string[]>();

  constructor(private readonly outputDir: string) {}

  filePath(key: string): string {
    return path.join(this.outputDir, `${key}.json`);
  }

  async publishGroup(group: string, entries: BadgeDocumentEntry[]): Promise<void> {
    const staged: Array<{ temp: string; target: string }> = [];
    try {
      for (const entry of entries) {
        const target = this.filePath(entry.key);
        const temp = `${target}.${process.pid}.tmp`;
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(temp, serializeBadgeDocument(entry.document), "utf-8");
        staged.push({ temp, target });
      }
    } catch (err) {
      await Promise.all(staged.map((s) => rm(s.temp, { force: true })));
      throw err;
    }

    for (const { temp, target } of staged) {
      await rename(temp, target);
    }

    const current = new Set(entries.map((e) => e.key));
    for (const stale of this.written.get(group) ?? []) {
      if (!current.has(stale)) {
        await rm(this.filePath(stale), { force: true });
      }
    }
    this.written.set(group, [...current]);
  }
}

// ============================================================================
// QUEUE
// ============================================================================

export interface PublishQueueOptions {
  ledger: LedgerService;
  targets: PublishTarget[];
  retry: PublishRetryConfig;
  clock?: () => Date;
  /** Drain after every ledger commit instead of waiting for the scheduler. */
  autoDrain?: boolean;
}

export interface PublishReport {
  published: string[];
  failed: string[];
  globalPublished: boolean;
  globalFailed: boolean;
}

export class PublishQueue {
  private readonly pending = new Set<string>();
  private globalDirty = false;
  private inFlight: Promise<PublishReport> | null = null;
  private drainRequested = false;
  private retryTimer: NodeJS.Timeout | null = null;
  private failedDrains = 0;
  private readonly clock: () => Date;
  private detach: (() => void) | null = null;

  constructor(private readonly options: PublishQueueOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** Subscribes to ledger commits; returns the unsubscribe function. */
  attach(): () => void {
    if (!this.detach) {
      this.detach = this.options.ledger.onCommit((notice) => {
        this.enqueue(notice.hunterIds);
        if (this.options.autoDrain) this.requestDrain();
      });
    }
    const detach = this.detach;
    return () => {
      detach();
      this.detach = null;
      if (this.retryTimer) {
        clearTimeout(this.retryTimer);
        this.retryTimer = null;
      }
    };
  }

  enqueue(hunterIds: string[]): void {
    for (const id of hunterIds) {
      this.pending.add(id);
    }
    if (hunterIds.length > 0) {
      this.globalDirty = true;
    }
  }

  /** Marks the global documents for republishing on the next drain. */
  markGlobalDirty(): void {
    this.globalDirty = true;
  }

  pendingHunters(): string[] {
    return [...this.pending].sort();
  }

  get isGlobalDirty(): boolean {
    return this.globalDirty;
  }

  /**
   * Starts a drain, or schedules one more after the drain in progress so
   * hunters enqueued meanwhile are not left waiting.
   */
  private requestDrain(): void {
    if (this.inFlight) {
      this.drainRequested = true;
      return;
    }
    this.drain().catch((err: unknown) => {
      console.error(`[Publisher] Drain failed:`, err);
    });
  }

  /** Concurrent callers share the drain already in progress. */
  drain(): Promise<PublishReport> {
    if (!this.inFlight) {
      this.inFlight = this.runDrain()
        .then(
          (report) => {
            this.afterDrain(report.failed.length > 0 || report.globalFailed);
            return report;
          },
          (err: unknown) => {
            this.afterDrain(true);
            throw err;
          }
        )
        .finally(() => {
          this.inFlight = null;
          if (this.drainRequested) {
            this.drainRequested = false;
            this.requestDrain();
          }
        });
    }
    return this.inFlight;
  }

  /**
   * With auto-drain nothing else would pick up work left pending by a
   * failed drain, so schedule another one with exponential backoff.
   */
  private afterDrain(failed: boolean): void {
    if (!failed) {
      this.failedDrains = 0;
      return;
    }
    if (!this.options.autoDrain || !this.detach || this.retryTimer) return;

    const { minTimeoutMs, maxTimeoutMs } = this.options.retry;
    const delay = Math.min(minTimeoutMs * 2 ** this.failedDrains, maxTimeoutMs);
    this.failedDrains += 1;
    console.warn(`[Publisher] ${this.pending.size} hunter(s) still pending, next drain in ${delay}ms`);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.requestDrain();
    }, delay);
    this.retryTimer.unref();
  }

  private async runDrain(): Promise<PublishReport> {
    const report: PublishReport = { published: [], failed: [], globalPublished: false, globalFailed: false };
    const batch = this.pendingHunters();
    const includeGlobal = this.globalDirty;
    if (batch.length === 0 && !includeGlobal) return report;

    this.pending.clear();
    this.globalDirty = false;

    const { ledger } = this.options;
    let view: PublishView;
    try {
      view = await ledger.publishView();
    } catch (err) {
      // Nothing published yet: put the whole batch back.
      this.enqueue(batch);
      if (includeGlobal) this.globalDirty = true;
      throw err;
    }
    const publishDay = this.clock();
    const { awards } = view;
    const byId = new Map(view.hunters.map((h) => [h.hunterId, h]));

    for (const hunterId of batch) {
      const hunter = byId.get(hunterId);
      if (!hunter) {
        console.warn(`[Publisher] Hunter ${hunterId} not in ledger snapshot, skipping`);
        continue;
      }
      const ok = await this.publishWithRetry(
        hunterGroup(hunterId),
        buildHunterDocuments(hunter, awardsFor(awards, hunter), ledger.registry, publishDay),
        [hunterId]
      );
      if (ok) {
        report.published.push(hunterId);
      } else {
        report.failed.push(hunterId);
        this.pending.add(hunterId);
      }
    }

    if (includeGlobal) {
      const ok = await this.publishWithRetry(
        GLOBAL_GROUP,
        buildGlobalDocuments(renderLeaderboard(view.hunters), awards, publishDay),
        []
      );
      report.globalPublished = ok;
      report.globalFailed = !ok;
      if (!ok) this.globalDirty = true;
    }

    console.log(
      `[Publisher] Drain complete (ledger v${view.version}): ${report.published.length} published, ${report.failed.length} failed${includeGlobal ? `, global ${report.globalPublished ? "published" : "failed"}` : ""}`
    );
    return report;
  }

  private async publishWithRetry(group: string, entries: BadgeDocumentEntry[], hunterIds: string[]): Promise<boolean> {
    const { retry, targets } = this.options;
    for (const target of targets) {
      try {
        await pRetry(() => target.publishGroup(group, entries), {
          retries: retry.retries,
          minTimeout: retry.minTimeoutMs,
          maxTimeout: retry.maxTimeoutMs,
          factor: 2,
          onFailedAttempt: (error) => {
            console.warn(
              `[Publisher] ${target.name} attempt ${error.attemptNumber} for ${group} failed (${error.retriesLeft} retries left): ${error.message}`
            );
          },
        });
      } catch (err) {
        const failure = new PublishFailureError(hunterIds, err);
        console.error(`[Publisher] ${failure.message} (target ${target.name}); will retry on next drain`);
        return false;
      }
    }
    return true;
  }
}

function awardsFor(awards: readonly Award[], hunter: HunterState): Award[] {
  return awards.filter((a) => a.hunterId === hunter.hunterId);
}
