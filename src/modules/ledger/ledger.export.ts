import { z } from "zod";
import { normalizeHunterId } from "./ledger.ingestor.js";
import { ACTION_KINDS, type Award, type BadgeGrant, type HunterState, type LedgerExport, type SerializedAward, type SerializedHunter } from "./ledger.types.js";

export function serializeAward(award: Award, seq: number): SerializedAward {
  return {
    seq,
    idempotencyKey: award.idempotencyKey,
    hunterId: award.hunterId,
    actionKind: award.actionKind,
    referenceAmount: award.referenceAmount,
    tier: award.tier,
    xp: award.xp,
    sourceRef: award.sourceRef,
    description: award.description,
    degraded: award.degraded,
    timestamp: award.timestamp.toISOString(),
    recordedAt: award.recordedAt.toISOString(),
  };
}

export function serializeHunter(state: HunterState): SerializedHunter {
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
    awardCount: state.awardCount,
    lastAction: state.lastAction
      ? {
          description: state.lastAction.description,
          xp: state.lastAction.xp,
          timestamp: state.lastAction.timestamp.toISOString(),
        }
      : null,
    firstAwardAt: state.firstAwardAt ? state.firstAwardAt.toISOString() : null,
  };
}

export function buildLedgerExport(awards: Award[], hunters: HunterState[], exportedAt: Date): LedgerExport {
  return {
    formatVersion: 1,
    exportedAt: exportedAt.toISOString(),
    awards: awards.map((award, i) => serializeAward(award, i + 1)),
    hunters: [...hunters]
      .sort((a, b) => (a.hunterId < b.hunterId ? -1 : a.hunterId > b.hunterId ? 1 : 0))
      .map(serializeHunter),
  };
}

const isoDate = z.string().datetime({ offset: true }).transform((v) => new Date(v));

const serializedAwardSchema = z.object({
  seq: z.number().int().positive(),
  idempotencyKey: z.string().min(1),
  hunterId: z.string().min(1),
  actionKind: z.enum(ACTION_KINDS),
  referenceAmount: z.number().nonnegative().nullable(),
  tier: z.enum(["micro", "standard", "major", "critical"]).nullable(),
  xp: z.number().int().nonnegative(),
  sourceRef: z.string().min(1),
  description: z.string(),
  degraded: z.boolean(),
  timestamp: isoDate,
  recordedAt: isoDate,
});

export const ledgerExportSchema = z.object({
  formatVersion: z.literal(1),
  exportedAt: z.string(),
  awards: z.array(serializedAwardSchema),
  hunters: z
    .array(
      z.object({
        hunterId: z.string().transform(normalizeHunterId).pipe(z.string().min(1)),
        wallet: z.string().nullable(),
        badges: z
          .array(
            z.object({
              badgeId: z.string().min(1),
              qualifiedAt: isoDate.nullable(),
              grantedAt: isoDate,
            })
          )
          .default([]),
      }).passthrough()
    )
    .default([]),
});

export interface RestoredHunter {
  hunterId: string;
  wallet: string | null;
  badges: BadgeGrant[];
}

export interface ParsedLedgerExport {
  awards: Award[];
  hunters: RestoredHunter[];
}

/**
 * Awards are replayed in `seq` order. Wallets and badge grants come from
 * the hunter snapshots; XP, level and the rest are re-derived.
 */
export function parseLedgerExport(input: unknown): ParsedLedgerExport {
  const data = ledgerExportSchema.parse(input);
  const awards: Award[] = [...data.awards]
    .sort((a, b) => a.seq - b.seq)
    .map((a) => ({
      idempotencyKey: a.idempotencyKey,
      hunterId: a.hunterId,
      actionKind: a.actionKind,
      referenceAmount: a.referenceAmount,
      tier: a.tier,
      xp: a.xp,
      sourceRef: a.sourceRef,
      description: a.description,
      degraded: a.degraded,
      timestamp: a.timestamp,
      recordedAt: a.recordedAt,
    }));

  const hunters = data.hunters.map((h) => ({
    hunterId: h.hunterId,
    wallet: h.wallet,
    badges: h.badges.map((g) => ({ badgeId: g.badgeId, qualifiedAt: g.qualifiedAt, grantedAt: g.grantedAt })),
  }));
  return { awards, hunters };
}
