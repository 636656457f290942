import { createHash } from "node:crypto";
import { z } from "zod";
import {
  isTieredAction,
  type ProgressionTables,
} from "../../config/progressionTables.js";
import { classifyReferenceAmount, parseReferenceAmount, xpForTier } from "../../services/classification/TierService.js";
import { InvalidEventError, UnknownActionKindError } from "./ledger.errors.js";
import { isActionKind, type ActionKind, type Award, type TierCode } from "./ledger.types.js";

/** Handles arrive as `@name` from issue comments; the ledger keys on `name`. */
export function normalizeHunterId(hunterId: string): string {
  return hunterId.trim().replace(/^@+/, "");
}

export const awardEventSchema = z.object({
  hunterId: z
    .string()
    .transform(normalizeHunterId)
    .pipe(z.string().min(1, "hunterId is required")),
  actionKind: z.string().trim().min(1, "actionKind is required"),
  // Never rejected here: bad amounts degrade to the lowest tier.
  referenceAmount: z.unknown().optional(),
  sourceRef: z
    .union([z.string(), z.number()])
    .transform((v) => String(v).trim())
    .pipe(z.string().min(1, "sourceRef is required")),
  timestamp: z.union([z.string().min(1), z.number(), z.date()]).pipe(z.coerce.date()),
  idempotencyKey: z.string().trim().min(1).optional(),
  wallet: z.string().trim().min(1).optional(),
});

export type ParsedAwardEvent = z.infer<typeof awardEventSchema>;

export interface ClassifiedAward {
  award: Award;
  degradedReason?: string;
  wallet?: string;
}

const ACTION_LABELS: Record<ActionKind, string> = {
  claim: "Bounty claimed",
  "pr-submitted": "PR submitted",
  "pr-merged": "PR merged",
  "tutorial-accepted": "Tutorial accepted",
  "bug-accepted": "Bug report accepted",
  "outreach-accepted": "Outreach accepted",
  "vintage-proof": "Vintage proof accepted",
  "first-completion-bonus": "First completion bonus",
};

export function deriveIdempotencyKey(hunterId: string, actionKind: string, sourceRef: string): string {
  const digest = createHash("sha256")
    .update([hunterId, actionKind, sourceRef].join("\u0000"))
    .digest("hex");
  return `auto:${digest}`;
}

function formatAmount(amount: number): string {
  return `${Number.isInteger(amount) ? amount : amount.toFixed(2)} RTC`;
}

function describeAward(
  kind: ActionKind,
  sourceRef: string,
  tier: TierCode | null,
  amount: number | null,
  degraded: boolean
): string {
  const details: string[] = [];
  if (tier) details.push(`${tier} tier`);
  if (amount !== null) details.push(formatAmount(amount));
  else if (degraded) details.push("amount unknown");

  const base = `${ACTION_LABELS[kind]} ${sourceRef}`;
  return details.length > 0 ? `${base} (${details.join(", ")})` : base;
}

/**
 * Turns a raw trigger event into an Award ready for the ledger. Pure: no
 * lookups, no side effects. Duplicate detection belongs to the ledger,
 * which owns the idempotency key index.
 */
export function classifyEvent(
  raw: unknown,
  tables: ProgressionTables,
  recordedAt: Date = new Date()
): ClassifiedAward {
  const parsed = awardEventSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidEventError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "event"}: ${issue.message}`)
    );
  }

  const event = parsed.data;
  if (!isActionKind(event.actionKind)) {
    throw new UnknownActionKindError(event.actionKind, event.sourceRef);
  }
  const actionKind = event.actionKind;

  let xp: number;
  let tier: TierCode | null = null;
  let referenceAmount: number | null;
  let degraded = false;
  let degradedReason: string | undefined;

  if (isTieredAction(actionKind)) {
    const classification = classifyReferenceAmount(event.referenceAmount, tables.tierBands);
    tier = classification.tier;
    referenceAmount = classification.amount;
    degraded = classification.degraded;
    degradedReason = classification.reason;
    xp = xpForTier(actionKind, classification.tier, tables);
  } else {
    xp = tables.flatXp[actionKind];
    referenceAmount = parseReferenceAmount(event.referenceAmount);
  }

  const idempotencyKey =
    event.idempotencyKey ?? deriveIdempotencyKey(event.hunterId, actionKind, event.sourceRef);

  const award: Award = {
    idempotencyKey,
    hunterId: event.hunterId,
    actionKind,
    referenceAmount,
    tier,
    xp,
    sourceRef: event.sourceRef,
    description: describeAward(actionKind, event.sourceRef, tier, referenceAmount, degraded),
    degraded,
    timestamp: event.timestamp,
    recordedAt,
  };

  return { award, degradedReason, wallet: event.wallet };
}
