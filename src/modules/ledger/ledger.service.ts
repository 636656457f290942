// src/modules/ledger/ledger.service.ts
// XP ledger: the only writer of award history and hunter snapshots

import pLimit from "p-limit";
import {
  DEFAULT_PROGRESSION_TABLES,
  validateProgressionTables,
  type ProgressionTables,
} from "../../config/progressionTables.js";
import { createDefaultBadgeRegistry, type BadgeRegistry } from "../../data/badgeRegistry.js";
import { DuplicateEventError, LedgerError } from "./ledger.errors.js";
import { badgeIds, deriveHunterState } from "./ledger.evaluator.js";
import { buildLedgerExport, parseLedgerExport } from "./ledger.export.js";
import { classifyEvent, normalizeHunterId, type ClassifiedAward } from "./ledger.ingestor.js";
import type { LedgerStore } from "./ledger.store.js";
import type {
  AppendResult,
  Award,
  BackfillReport,
  BadgeGrant,
  HunterState,
  LedgerExport,
  LedgerSnapshot,
  RecomputeReport,
  RejectedEvent,
} from "./ledger.types.js";

export interface LedgerCommitNotice {
  version: number;
  hunterIds: string[];
}

export type LedgerListener = (notice: LedgerCommitNotice) => void;

export interface LedgerServiceOptions {
  store: LedgerStore;
  tables?: ProgressionTables;
  registry?: BadgeRegistry;
  clock?: () => Date;
}

interface ImportItem {
  index: number;
  award: Award;
  wallet?: string;
}

/** Per-hunter state carried over from an export: wallet and recorded grants. */
interface HunterSeed {
  wallet: string | null;
  badges: BadgeGrant[];
}

export interface PublishView {
  version: number;
  hunters: HunterState[];
  awards: Award[];
}

function sourceRefOf(raw: unknown): string | null {
  if (typeof raw === "object" && raw !== null && "sourceRef" in raw) {
    const ref = raw.sourceRef;
    if (typeof ref === "string" || typeof ref === "number") return String(ref);
  }
  return null;
}

function sameDate(a: Date | null, b: Date | null): boolean {
  return (a ? a.getTime() : null) === (b ? b.getTime() : null);
}

/** True when the cached snapshot disagrees with a fresh derivation. */
function hasDrift(cached: HunterState, derived: HunterState): boolean {
  return (
    cached.xp !== derived.xp ||
    cached.level !== derived.level ||
    cached.title !== derived.title ||
    cached.awardCount !== derived.awardCount ||
    !sameDate(cached.firstAwardAt, derived.firstAwardAt) ||
    cached.lastAction?.description !== derived.lastAction?.description ||
    !sameDate(cached.lastAction?.timestamp ?? null, derived.lastAction?.timestamp ?? null)
  );
}

export class LedgerService {
  readonly tables: ProgressionTables;
  readonly registry: BadgeRegistry;
  private readonly store: LedgerStore;
  private readonly clock: () => Date;
  // Serializes commits and snapshot reads.
  private readonly lock = pLimit(1);
  private readonly listeners = new Set<LedgerListener>();
  private version = 0;

  constructor(options: LedgerServiceOptions) {
    this.store = options.store;
    this.tables = options.tables ?? DEFAULT_PROGRESSION_TABLES;
    this.registry = options.registry ?? createDefaultBadgeRegistry();
    this.clock = options.clock ?? (() => new Date());
    validateProgressionTables(this.tables);
  }

  get currentVersion(): number {
    return this.version;
  }

  onCommit(listener: LedgerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Live append of one event. Throws DuplicateEventError,
   * UnknownActionKindError or InvalidEventError with no state change.
   */
  async append(event: unknown): Promise<AppendResult> {
    const now = this.clock();
    let classified: ClassifiedAward;
    try {
      classified = classifyEvent(event, this.tables, now);
    } catch (err) {
      this.logRejection(err, sourceRefOf(event));
      throw err;
    }
    const { award } = classified;

    const committed = await this.lock(async () => {
      const existing = await this.store.findExistingKeys([award.idempotencyKey]);
      if (existing.has(award.idempotencyKey)) {
        throw new DuplicateEventError(award.idempotencyKey, award.sourceRef);
      }

      const previous = await this.store.getHunter(award.hunterId);
      const history = await this.store.listAwards(award.hunterId);
      const hunter = deriveHunterState({
        hunterId: award.hunterId,
        awards: [...history, award],
        previous,
        wallet: classified.wallet,
        registry: this.registry,
        tables: this.tables,
        now,
      });

      await this.store.commit({ awards: [award], hunters: [hunter] });
      this.version += 1;
      return { hunter, previous, version: this.version };
    }).catch((err: unknown) => {
      this.logRejection(err, award.sourceRef);
      throw err;
    });

    const before = new Set(committed.previous ? badgeIds(committed.previous) : []);
    const newBadges = badgeIds(committed.hunter).filter((id) => !before.has(id));
    const levelChanged = committed.previous ? committed.previous.level !== committed.hunter.level : false;

    if (award.degraded) {
      console.warn(
        `[Ledger] Degraded classification for ${award.sourceRef} (${award.hunterId}): ${classified.degradedReason ?? "unknown reason"}; awarded ${award.xp} XP at ${award.tier} tier, flagged for review`
      );
    }
    console.log(
      `[Ledger] ${award.hunterId} +${award.xp} XP (${award.actionKind}, ${award.sourceRef}) -> ${committed.hunter.xp} XP, L${committed.hunter.level} ${committed.hunter.title}${newBadges.length ? ` | new badges: ${newBadges.join(", ")}` : ""}`
    );

    this.notify({ version: committed.version, hunterIds: [award.hunterId] });

    return {
      hunter: committed.hunter,
      award,
      degraded: award.degraded,
      newBadges,
      levelChanged,
    };
  }

  /**
   * Bulk import of historical events. Arrival order does not matter: the
   * result equals appending the same set live in timestamp order.
   */
  async backfill(events: unknown[]): Promise<BackfillReport> {
    const now = this.clock();
    const report: BackfillReport = { imported: 0, duplicates: [], rejected: [], degraded: [], hunters: [] };
    const items: ImportItem[] = [];

    events.forEach((raw, index) => {
      try {
        const classified = classifyEvent(raw, this.tables, now);
        items.push({ index, award: classified.award, wallet: classified.wallet });
      } catch (err) {
        if (!(err instanceof LedgerError)) throw err;
        report.rejected.push({ index, sourceRef: sourceRefOf(raw), code: err.code, message: err.message });
      }
    });

    await this.importItems(items, report, now);

    console.log(
      `[Ledger] Backfill complete: ${report.imported} imported, ${report.duplicates.length} duplicate(s), ${report.rejected.length} rejected, ${report.degraded.length} degraded, ${report.hunters.length} hunter(s) touched`
    );
    for (const rejected of report.rejected) {
      console.warn(`[Ledger] Backfill rejected #${rejected.index} (${rejected.sourceRef ?? "no sourceRef"}): ${rejected.message}`);
    }
    for (const ref of report.degraded) {
      console.warn(`[Ledger] Backfill degraded classification for ${ref}, flagged for review`);
    }
    return report;
  }

  /**
   * Replays an export produced by exportLedger(). Already-known awards are
   * skipped; exported wallets and badge grants are carried over, including
   * hunters that have no awards and grants the registry no longer derives.
   */
  async restore(input: unknown): Promise<BackfillReport> {
    const { awards, hunters } = parseLedgerExport(input);
    const report: BackfillReport = { imported: 0, duplicates: [], rejected: [], degraded: [], hunters: [] };
    const items: ImportItem[] = awards.map((award, index) => ({ index, award }));
    const seeds = new Map<string, HunterSeed>(
      hunters.map((h) => [h.hunterId, { wallet: h.wallet, badges: h.badges }])
    );
    await this.importItems(items, report, this.clock(), seeds);
    console.log(`[Ledger] Restore complete: ${report.imported} imported, ${report.duplicates.length} already present`);
    return report;
  }

  private async importItems(
    items: ImportItem[],
    report: BackfillReport,
    now: Date,
    seeds: ReadonlyMap<string, HunterSeed> = new Map()
  ): Promise<void> {
    const unique: ImportItem[] = [];
    const seen = new Set<string>();
    for (const item of items) {
      if (seen.has(item.award.idempotencyKey)) {
        report.duplicates.push(this.duplicateEntry(item));
        continue;
      }
      seen.add(item.award.idempotencyKey);
      unique.push(item);
    }

    const version = await this.lock(async () => {
      const existing = await this.store.findExistingKeys(unique.map((i) => i.award.idempotencyKey));
      const fresh = unique.filter((item) => {
        if (!existing.has(item.award.idempotencyKey)) return true;
        report.duplicates.push(this.duplicateEntry(item));
        return false;
      });

      const byHunter = new Map<string, ImportItem[]>();
      for (const item of fresh) {
        const list = byHunter.get(item.award.hunterId) ?? [];
        list.push(item);
        byHunter.set(item.award.hunterId, list);
      }

      const touched = [...new Set([...byHunter.keys(), ...seeds.keys()])].sort();
      const hunters: HunterState[] = [];
      for (const hunterId of touched) {
        const hunterItems = byHunter.get(hunterId) ?? [];
        const seed = seeds.get(hunterId);
        const previous = await this.store.getHunter(hunterId);
        const history = await this.store.listAwards(hunterId);
        const state = deriveHunterState({
          hunterId,
          awards: [...history, ...hunterItems.map((i) => i.award)],
          previous,
          carriedGrants: seed?.badges,
          wallet: latestWallet(hunterItems) ?? seed?.wallet ?? undefined,
          registry: this.registry,
          tables: this.tables,
          now,
        });
        // A seed that adds nothing to an existing hunter is not a change.
        const unchanged =
          previous !== undefined &&
          previous.wallet === state.wallet &&
          previous.badges.length === state.badges.length;
        if (hunterItems.length === 0 && unchanged) continue;
        hunters.push(state);
      }
      if (hunters.length === 0) return null;

      await this.store.commit({ awards: fresh.map((i) => i.award), hunters });
      this.version += 1;
      report.imported = fresh.length;
      report.degraded = fresh.filter((i) => i.award.degraded).map((i) => i.award.sourceRef);
      report.hunters = hunters.map((h) => h.hunterId);
      return this.version;
    });

    if (version !== null) {
      this.notify({ version, hunterIds: report.hunters });
    }
  }

  private duplicateEntry(item: ImportItem): RejectedEvent {
    return {
      index: item.index,
      sourceRef: item.award.sourceRef,
      code: "DUPLICATE_EVENT",
      message: `Duplicate event for ${item.award.sourceRef} (key ${item.award.idempotencyKey})`,
    };
  }

  /** Creates the hunter if needed and records (or amends) its wallet. */
  async registerHunter(hunterId: string, wallet: string | null): Promise<HunterState> {
    const id = normalizeHunterId(hunterId);
    if (!id) {
      throw new LedgerError("INVALID_EVENT", "hunterId is required");
    }
    const now = this.clock();
    const { hunter, version } = await this.lock(async () => {
      const previous = await this.store.getHunter(id);
      const history = await this.store.listAwards(id);
      const state = deriveHunterState({
        hunterId: id,
        awards: history,
        previous,
        wallet,
        registry: this.registry,
        tables: this.tables,
        now,
      });
      await this.store.commit({ awards: [], hunters: [state] });
      this.version += 1;
      return { hunter: state, version: this.version };
    });
    console.log(`[Ledger] Wallet for ${id} set to ${wallet ?? "(none)"}`);
    this.notify({ version, hunterIds: [id] });
    return hunter;
  }

  async recomputeHunter(hunterId: string): Promise<RecomputeReport> {
    return this.recompute([normalizeHunterId(hunterId)]);
  }

  /**
   * Rebuilds every hunter from its awards, repairs cache drift and grants
   * badges whose definitions were added after the qualifying history.
   */
  async recomputeAll(): Promise<RecomputeReport> {
    return this.recompute(null);
  }

  private async recompute(only: string[] | null): Promise<RecomputeReport> {
    const now = this.clock();
    const report: RecomputeReport = { hunters: 0, repaired: [], badgesGranted: [] };

    const version = await this.lock(async () => {
      const cached = new Map((await this.store.listHunters()).map((h) => [h.hunterId, h]));
      const awards = await this.store.listAwards();
      const byHunter = new Map<string, Award[]>();
      for (const award of awards) {
        const list = byHunter.get(award.hunterId) ?? [];
        list.push(award);
        byHunter.set(award.hunterId, list);
      }

      const ids = only ?? [...new Set([...cached.keys(), ...byHunter.keys()])].sort();
      const changed: HunterState[] = [];

      for (const hunterId of ids) {
        const previous = cached.get(hunterId);
        const history = byHunter.get(hunterId) ?? [];
        if (!previous && history.length === 0) continue;
        report.hunters += 1;

        const derived = deriveHunterState({
          hunterId,
          awards: history,
          previous,
          registry: this.registry,
          tables: this.tables,
          now,
        });

        const drift = !previous || hasDrift(previous, derived);
        const before = new Set(previous ? badgeIds(previous) : []);
        const granted = badgeIds(derived).filter((id) => !before.has(id));

        if (drift) {
          report.repaired.push(hunterId);
          console.warn(
            `[Ledger] Snapshot drift for ${hunterId}: cached ${previous ? `${previous.xp} XP/L${previous.level}` : "missing"}, derived ${derived.xp} XP/L${derived.level}; repaired`
          );
        }
        for (const badgeId of granted) {
          report.badgesGranted.push({ hunterId, badgeId });
        }
        if (drift || granted.length > 0) {
          changed.push(derived);
        }
      }

      if (changed.length === 0) return null;
      await this.store.commit({ awards: [], hunters: changed });
      this.version += 1;
      return { version: this.version, hunterIds: changed.map((h) => h.hunterId) };
    });

    console.log(
      `[Ledger] Recompute: ${report.hunters} hunter(s) checked, ${report.repaired.length} repaired, ${report.badgesGranted.length} badge(s) granted`
    );
    if (version) {
      this.notify(version);
    }
    return report;
  }

  async getHunter(hunterId: string): Promise<HunterState | undefined> {
    return this.store.getHunter(normalizeHunterId(hunterId));
  }

  async listHunters(): Promise<HunterState[]> {
    return this.store.listHunters();
  }

  async listAwards(hunterId?: string): Promise<Award[]> {
    return this.store.listAwards(hunterId === undefined ? undefined : normalizeHunterId(hunterId));
  }

  /** Whole-population read that never interleaves with a commit. */
  async snapshot(): Promise<LedgerSnapshot> {
    return this.lock(async () => ({
      version: this.version,
      hunters: await this.store.listHunters(),
    }));
  }

  /**
   * Hunters and the full award log from one locked read, so documents built
   * from them never mix two ledger versions.
   */
  async publishView(): Promise<PublishView> {
    return this.lock(async () => {
      const [hunters, awards] = await Promise.all([this.store.listHunters(), this.store.listAwards()]);
      return { version: this.version, hunters, awards };
    });
  }

  async exportLedger(): Promise<LedgerExport> {
    return this.lock(async () => {
      const [awards, hunters] = await Promise.all([this.store.listAwards(), this.store.listHunters()]);
      return buildLedgerExport(awards, hunters, this.clock());
    });
  }

  private notify(notice: LedgerCommitNotice): void {
    for (const listener of this.listeners) {
      try {
        listener(notice);
      } catch (err) {
        console.error(`[Ledger] Commit listener failed for version ${notice.version}:`, err);
      }
    }
  }

  private logRejection(err: unknown, sourceRef: string | null): void {
    if (err instanceof DuplicateEventError) {
      console.warn(`[Ledger] Duplicate event ignored: ${err.sourceRef} (key ${err.idempotencyKey})`);
    } else if (err instanceof LedgerError) {
      console.warn(`[Ledger] Event rejected (${err.code}) ${sourceRef ?? "no sourceRef"}: ${err.message}`);
    }
  }
}

function latestWallet(items: ImportItem[]): string | undefined {
  let wallet: string | undefined;
  let latest = Number.NEGATIVE_INFINITY;
  for (const item of items) {
    const ts = item.award.timestamp.getTime();
    if (item.wallet && ts >= latest) {
      wallet = item.wallet;
      latest = ts;
    }
  }
  return wallet;
}
