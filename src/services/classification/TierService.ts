/**
 * TierService - Bounty Tier Classification
 *
 * Classifies the RTC reference amount attached to a PR event into a
 * payout band, then maps the band to the XP award for that action.
 *
 * Input: raw reference amount (number, numeric string, or "25 RTC")
 * Output: TierCode = micro | standard | major | critical
 *
 * classifyReferenceAmount() is PURE. Missing or malformed amounts fall
 * back to the lowest band and are flagged as degraded instead of being
 * rejected.
 */

import type { TierCode } from "../../modules/ledger/ledger.types.js";
import type {
  ProgressionTables,
  TierBand,
  TieredActionKind,
} from "../../config/progressionTables.js";

export interface TierClassification {
  tier: TierCode;
  amount: number | null;
  degraded: boolean;
  reason?: string;
}

/* ---------------------------------------------
 *  Amount parsing
 * --------------------------------------------- */

const AMOUNT_PATTERN = /^\s*(\d+(?:\.\d+)?)\s*(?:rtc)?\s*$/i;

/**
 * Parse a reference amount. Returns null for anything that is not a
 * finite, non-negative number.
 */
export function parseReferenceAmount(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw >= 0 ? raw : null;
  }
  if (typeof raw === "string") {
    const match = AMOUNT_PATTERN.exec(raw);
    if (!match) return null;
    const value = Number(match[1]);
    return Number.isFinite(value) ? value : null;
  }
  return null;
}

/* ---------------------------------------------
 *  Band mapping
 * --------------------------------------------- */

/**
 * micro (<= 10), standard (<= 50), major (<= 100), critical (> 100)
 * with the default bands.
 */
export function tierForAmount(amount: number, bands: TierBand[]): TierCode {
  for (const band of bands) {
    if (band.maxAmount === null || amount <= band.maxAmount) {
      return band.tier;
    }
  }
  return bands[bands.length - 1].tier;
}

/* ---------------------------------------------
 *  PUBLIC API
 * --------------------------------------------- */

export function classifyReferenceAmount(raw: unknown, bands: TierBand[]): TierClassification {
  const lowest = bands[0].tier;

  if (raw === undefined || raw === null || raw === "") {
    return { tier: lowest, amount: null, degraded: true, reason: "reference amount missing" };
  }

  const amount = parseReferenceAmount(raw);
  if (amount === null) {
    return {
      tier: lowest,
      amount: null,
      degraded: true,
      reason: `reference amount malformed: ${JSON.stringify(raw)}`,
    };
  }

  return { tier: tierForAmount(amount, bands), amount, degraded: false };
}

export function xpForTier(
  action: TieredActionKind,
  tier: TierCode,
  tables: ProgressionTables
): number {
  return tables.tieredXp[action][tier];
}
