// src/config/progressionTables.ts
// XP awards, tier bands and the level table

import { ACTION_KINDS, type ActionKind, type TierCode } from "../modules/ledger/ledger.types.js";
import { ConfigurationError } from "../modules/ledger/ledger.errors.js";

export interface LevelDef {
  minXp: number;
  level: number;
  title: string;
  perk: string;
}

export interface TierBand {
  tier: TierCode;
  /** Inclusive upper bound in RTC; null for the open-ended top band. */
  maxAmount: number | null;
}

export type TieredActionKind = "pr-submitted" | "pr-merged";

export type FlatActionKind = Exclude<ActionKind, TieredActionKind>;

export interface ProgressionTables {
  flatXp: Record<FlatActionKind, number>;
  tieredXp: Record<TieredActionKind, Record<TierCode, number>>;
  tierBands: TierBand[];
  levels: LevelDef[];
}

export const TIER_CODES: readonly TierCode[] = ["micro", "standard", "major", "critical"];

export const TIERED_ACTIONS: readonly TieredActionKind[] = ["pr-submitted", "pr-merged"];

export function isTieredAction(kind: ActionKind): kind is TieredActionKind {
  return kind === "pr-submitted" || kind === "pr-merged";
}

export const DEFAULT_PROGRESSION_TABLES: ProgressionTables = {
  flatXp: {
    claim: 20,
    "tutorial-accepted": 150,
    "bug-accepted": 100,
    "outreach-accepted": 30,
    "vintage-proof": 100,
    "first-completion-bonus": 50,
  },
  tieredXp: {
    "pr-submitted": { micro: 50, standard: 100, major: 200, critical: 300 },
    // Merge bonus is its own table, not the submission table doubled.
    "pr-merged": { micro: 100, standard: 100, major: 300, critical: 500 },
  },
  tierBands: [
    { tier: "micro", maxAmount: 10 },
    { tier: "standard", maxAmount: 50 },
    { tier: "major", maxAmount: 100 },
    { tier: "critical", maxAmount: null },
  ],
  levels: [
    { minXp: 0, level: 1, title: "Starting Hunter", perk: "Access to micro bounties" },
    { minXp: 200, level: 2, title: "Basic Hunter", perk: "Name on the public tracker" },
    { minXp: 500, level: 3, title: "Priority Hunter", perk: "Priority review queue" },
    { minXp: 1000, level: 4, title: "Rising Hunter", perk: "Early access to new bounties" },
    { minXp: 2000, level: 5, title: "Multiplier Hunter", perk: "1.1x payout multiplier" },
    { minXp: 3500, level: 6, title: "Featured Hunter", perk: "Featured in release notes" },
    { minXp: 5500, level: 7, title: "Veteran Hunter", perk: "Can review micro bounty PRs" },
    { minXp: 8000, level: 8, title: "Elite Hunter", perk: "Can propose new bounties" },
    { minXp: 12000, level: 9, title: "Master Hunter", perk: "Maintainer office hours" },
    { minXp: 18000, level: 10, title: "Legendary Hunter", perk: "Permanent hall of fame entry" },
  ],
};

function assertXpAmount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${label} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Startup check. Any problem here is a configuration error, never a
 * per-event error.
 */
export function validateProgressionTables(tables: ProgressionTables): void {
  const { levels, tierBands } = tables;

  if (levels.length === 0) {
    throw new ConfigurationError("Level table is empty");
  }
  if (levels[0].minXp !== 0) {
    throw new ConfigurationError(`First level must start at 0 XP, got ${levels[0].minXp}`);
  }
  for (let i = 1; i < levels.length; i++) {
    const prev = levels[i - 1];
    const cur = levels[i];
    if (cur.minXp <= prev.minXp) {
      throw new ConfigurationError(
        `Level thresholds must be strictly increasing: level ${cur.level} (${cur.minXp}) after level ${prev.level} (${prev.minXp})`
      );
    }
    if (cur.level <= prev.level) {
      throw new ConfigurationError(`Level numbers must be strictly increasing at index ${i}`);
    }
  }

  for (const kind of ACTION_KINDS) {
    if (isTieredAction(kind)) {
      const table = tables.tieredXp[kind];
      if (!table) {
        throw new ConfigurationError(`Missing tier XP table for '${kind}'`);
      }
      for (const tier of TIER_CODES) {
        const xp = table[tier];
        if (xp === undefined) {
          throw new ConfigurationError(`Missing ${tier} XP for '${kind}'`);
        }
        assertXpAmount(`${kind}.${tier}`, xp);
      }
    } else {
      const xp = tables.flatXp[kind];
      if (xp === undefined) {
        throw new ConfigurationError(`Missing XP amount for '${kind}'`);
      }
      assertXpAmount(kind, xp);
    }
  }

  if (tierBands.length !== TIER_CODES.length) {
    throw new ConfigurationError(`Expected ${TIER_CODES.length} tier bands, got ${tierBands.length}`);
  }
  let lastMax = -Infinity;
  tierBands.forEach((band, i) => {
    if (band.tier !== TIER_CODES[i]) {
      throw new ConfigurationError(`Tier band ${i} must be '${TIER_CODES[i]}', got '${band.tier}'`);
    }
    const isLast = i === tierBands.length - 1;
    if (isLast) {
      if (band.maxAmount !== null) {
        throw new ConfigurationError(`Top tier band '${band.tier}' must be open-ended`);
      }
      return;
    }
    if (band.maxAmount === null || band.maxAmount <= lastMax) {
      throw new ConfigurationError(`Tier band limits must be strictly increasing at '${band.tier}'`);
    }
    lastMax = band.maxAmount;
  });
}

export function levelForXp(xp: number, levels: LevelDef[]): LevelDef {
  let current = levels[0];
  for (const def of levels) {
    if (xp >= def.minXp) {
      current = def;
    } else {
      break;
    }
  }
  return current;
}
