import { asc, eq, inArray } from "drizzle-orm";
import type { Database } from "../../../server/db.js";
import {
  awards,
  hunters,
  insertAwardSchema,
  type AwardRow,
  type HunterRow,
  type InsertAward,
  type InsertHunter,
} from "../../../shared/schema.js";
import { DuplicateEventError } from "./ledger.errors.js";
import type { LedgerCommit, LedgerStore } from "./ledger.store.js";
import {
  ACTION_KINDS,
  emptyActionCounts,
  isActionKind,
  type Award,
  type HunterState,
  type TierCode,
} from "./ledger.types.js";

const TIERS: readonly string[] = ["micro", "standard", "major", "critical"];

function isTierCode(value: string): value is TierCode {
  return TIERS.includes(value);
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "23505";
}

function toAward(row: AwardRow): Award {
  if (!isActionKind(row.actionKind)) {
    throw new Error(`[PgLedgerStore] award ${row.id} has unknown action kind '${row.actionKind}'`);
  }
  let tier: TierCode | null = null;
  if (row.tier !== null) {
    if (!isTierCode(row.tier)) {
      throw new Error(`[PgLedgerStore] award ${row.id} has unknown tier '${row.tier}'`);
    }
    tier = row.tier;
  }
  return {
    idempotencyKey: row.idempotencyKey,
    hunterId: row.hunterId,
    actionKind: row.actionKind,
    referenceAmount: row.referenceAmount,
    tier,
    xp: row.xp,
    sourceRef: row.sourceRef,
    description: row.description,
    degraded: row.degraded,
    timestamp: row.occurredAt,
    recordedAt: row.recordedAt,
  };
}

function toAwardRow(award: Award): InsertAward {
  return {
    idempotencyKey: award.idempotencyKey,
    hunterId: award.hunterId,
    actionKind: award.actionKind,
    referenceAmount: award.referenceAmount,
    tier: award.tier,
    xp: award.xp,
    sourceRef: award.sourceRef,
    description: award.description,
    degraded: award.degraded,
    occurredAt: award.timestamp,
    recordedAt: award.recordedAt,
  };
}

function toHunter(row: HunterRow): HunterState {
  const actionCounts = emptyActionCounts();
  for (const kind of ACTION_KINDS) {
    actionCounts[kind] = row.actionCounts[kind] ?? 0;
  }
  return {
    hunterId: row.hunterId,
    wallet: row.wallet,
    xp: row.xp,
    level: row.level,
    title: row.title,
    badges: row.badges.map((g) => ({
      badgeId: g.badgeId,
      qualifiedAt: g.qualifiedAt ? new Date(g.qualifiedAt) : null,
      grantedAt: new Date(g.grantedAt),
    })),
    actionCounts,
    awardCount: row.awardCount,
    lastAction: row.lastAction
      ? {
          description: row.lastAction.description,
          xp: row.lastAction.xp,
          timestamp: new Date(row.lastAction.timestamp),
        }
      : null,
    firstAwardAt: row.firstAwardAt,
    updatedAt: row.updatedAt,
  };
}

function toHunterRow(state: HunterState): InsertHunter {
  return {
    hunterId: state.hunterId,
    wallet: state.wallet,
    xp: state.xp,
    level: state.level,
    title: state.title,
    badges: state.badges.map((g) => ({
      badgeId: g.badgeId,
      qualifiedAt: g.qualifiedAt ? g.qualifiedAt.toISOString() : null,
      grantedAt: g.grantedAt.toISOString(),
    })),
    actionCounts: { ...state.actionCounts },
    awardCount: state.awardCount,
    lastAction: state.lastAction
      ? {
          description: state.lastAction.description,
          xp: state.lastAction.xp,
          timestamp: state.lastAction.timestamp.toISOString(),
        }
      : null,
    firstAwardAt: state.firstAwardAt,
    updatedAt: state.updatedAt,
  };
}

/**
 * Postgres-backed ledger. Award inserts and hunter upserts share one
 * transaction; the unique index on idempotency_key backs duplicate checks.
 */
export class PgLedgerStore implements LedgerStore {
  constructor(private readonly db: Database) {}

  async findExistingKeys(keys: string[]): Promise<Set<string>> {
    if (keys.length === 0) return new Set();
    const rows = await this.db
      .select({ key: awards.idempotencyKey })
      .from(awards)
      .where(inArray(awards.idempotencyKey, keys));
    return new Set(rows.map((r) => r.key));
  }

  async listAwards(hunterId?: string): Promise<Award[]> {
    const rows = hunterId
      ? await this.db.select().from(awards).where(eq(awards.hunterId, hunterId)).orderBy(asc(awards.id))
      : await this.db.select().from(awards).orderBy(asc(awards.id));
    return rows.map(toAward);
  }

  async getHunter(hunterId: string): Promise<HunterState | undefined> {
    const [row] = await this.db.select().from(hunters).where(eq(hunters.hunterId, hunterId)).limit(1);
    return row ? toHunter(row) : undefined;
  }

  async listHunters(): Promise<HunterState[]> {
    const rows = await this.db.select().from(hunters);
    return rows.map(toHunter);
  }

  async commit(change: LedgerCommit): Promise<void> {
    try {
      await this.db.transaction(async (tx) => {
        if (change.awards.length > 0) {
          await tx.insert(awards).values(change.awards.map((a) => insertAwardSchema.parse(toAwardRow(a))));
        }
        for (const state of change.hunters) {
          const row = toHunterRow(state);
          await tx
            .insert(hunters)
            .values(row)
            .onConflictDoUpdate({
              target: hunters.hunterId,
              set: {
                wallet: row.wallet,
                xp: row.xp,
                level: row.level,
                title: row.title,
                badges: row.badges,
                actionCounts: row.actionCounts,
                awardCount: row.awardCount,
                lastAction: row.lastAction,
                firstAwardAt: row.firstAwardAt,
                updatedAt: row.updatedAt,
              },
            });
        }
      });
    } catch (err) {
      if (isUniqueViolation(err)) {
        const existing = await this.findExistingKeys(change.awards.map((a) => a.idempotencyKey));
        const dup = change.awards.find((a) => existing.has(a.idempotencyKey)) ?? change.awards[0];
        throw new DuplicateEventError(dup.idempotencyKey, dup.sourceRef);
      }
      throw err;
    }
  }
}
