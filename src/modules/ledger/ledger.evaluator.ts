// Level and badge derivation. Everything here is a pure function of a
// hunter's awards plus previously recorded grants.

import { levelForXp, type ProgressionTables } from "../../config/progressionTables.js";
import type { BadgeRegistry, BadgeView } from "../../data/badgeRegistry.js";
import {
  emptyActionCounts,
  type ActionCounts,
  type Award,
  type BadgeGrant,
  type HunterState,
} from "./ledger.types.js";

export interface DeriveHunterInput {
  hunterId: string;
  awards: readonly Award[];
  previous?: HunterState;
  /** Grants recorded elsewhere (a restored export); `previous` wins on conflict. */
  carriedGrants?: readonly BadgeGrant[];
  wallet?: string | null;
  registry: BadgeRegistry;
  tables: ProgressionTables;
  now: Date;
}

/** Timestamp order with the idempotency key as a stable tie-break. */
export function sortAwards(awards: readonly Award[]): Award[] {
  return [...awards].sort((a, b) => {
    const dt = a.timestamp.getTime() - b.timestamp.getTime();
    if (dt !== 0) return dt;
    return a.idempotencyKey < b.idempotencyKey ? -1 : a.idempotencyKey > b.idempotencyKey ? 1 : 0;
  });
}

export function countActions(awards: readonly Award[]): ActionCounts {
  const counts = emptyActionCounts();
  for (const award of awards) {
    counts[award.actionKind] += 1;
  }
  return counts;
}

export function sumXp(awards: readonly Award[]): number {
  return awards.reduce((total, award) => total + award.xp, 0);
}

export function buildBadgeView(hunterId: string, sortedAwards: readonly Award[]): BadgeView {
  return {
    hunterId,
    xp: sumXp(sortedAwards),
    awards: sortedAwards,
    actionCounts: countActions(sortedAwards),
  };
}

export function evaluateBadges(view: BadgeView, registry: BadgeRegistry): string[] {
  return registry
    .list()
    .filter((def) => def.predicate(view))
    .map((def) => def.id);
}

/**
 * Replays the sorted awards one at a time and returns, per badge id, the
 * timestamp of the award at which its predicate first held. A badge that
 * already holds with no awards maps to null.
 */
function findQualifyingTimes(
  hunterId: string,
  sortedAwards: readonly Award[],
  badgeIds: string[],
  registry: BadgeRegistry
): Map<string, Date | null> {
  const result = new Map<string, Date | null>();
  let pending = badgeIds.flatMap((id) => {
    const def = registry.get(id);
    return def ? [def] : [];
  });

  for (let k = 0; k <= sortedAwards.length && pending.length > 0; k++) {
    const view = buildBadgeView(hunterId, sortedAwards.slice(0, k));
    const qualifiedAt = k === 0 ? null : sortedAwards[k - 1].timestamp;
    pending = pending.filter((def) => {
      if (!def.predicate(view)) return true;
      result.set(def.id, qualifiedAt);
      return false;
    });
  }
  return result;
}

function compareGrants(a: BadgeGrant, b: BadgeGrant): number {
  const ta = a.qualifiedAt ? a.qualifiedAt.getTime() : Number.POSITIVE_INFINITY;
  const tb = b.qualifiedAt ? b.qualifiedAt.getTime() : Number.POSITIVE_INFINITY;
  if (ta !== tb) return ta - tb;
  return a.badgeId < b.badgeId ? -1 : a.badgeId > b.badgeId ? 1 : 0;
}

/**
 * Full derivation of a hunter from its award set. Badges already on
 * `previous` are kept even when their predicate no longer holds.
 */
export function deriveHunterState(input: DeriveHunterInput): HunterState {
  const { hunterId, previous, registry, tables, now } = input;
  const sorted = sortAwards(input.awards);
  const view = buildBadgeView(hunterId, sorted);
  const levelDef = levelForXp(view.xp, tables.levels);

  const grants = new Map<string, BadgeGrant>();
  for (const grant of previous?.badges ?? []) {
    grants.set(grant.badgeId, grant);
  }
  for (const grant of input.carriedGrants ?? []) {
    if (!grants.has(grant.badgeId)) grants.set(grant.badgeId, grant);
  }

  const newlySatisfied = evaluateBadges(view, registry).filter((id) => !grants.has(id));
  if (newlySatisfied.length > 0) {
    const qualifying = findQualifyingTimes(hunterId, sorted, newlySatisfied, registry);
    for (const badgeId of newlySatisfied) {
      grants.set(badgeId, { badgeId, qualifiedAt: qualifying.get(badgeId) ?? null, grantedAt: now });
    }
  }

  const latest = sorted.length > 0 ? sorted[sorted.length - 1] : null;
  const earliest = sorted.length > 0 ? sorted[0] : null;

  return {
    hunterId,
    wallet: input.wallet !== undefined ? input.wallet : previous?.wallet ?? null,
    xp: view.xp,
    level: levelDef.level,
    title: levelDef.title,
    badges: [...grants.values()].sort(compareGrants),
    actionCounts: view.actionCounts,
    awardCount: sorted.length,
    lastAction: latest
      ? { description: latest.description, xp: latest.xp, timestamp: latest.timestamp }
      : null,
    firstAwardAt: earliest ? earliest.timestamp : null,
    updatedAt: now,
  };
}

export function badgeIds(state: HunterState): string[] {
  return state.badges.map((grant) => grant.badgeId);
}
