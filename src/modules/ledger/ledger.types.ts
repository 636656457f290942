export const ACTION_KINDS = [
  "claim",
  "pr-submitted",
  "pr-merged",
  "tutorial-accepted",
  "bug-accepted",
  "outreach-accepted",
  "vintage-proof",
  "first-completion-bonus",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type TierCode = "micro" | "standard" | "major" | "critical";

export type ActionCounts = Record<ActionKind, number>;

/**
 * Raw event as delivered by the trigger collaborator (webhook, polling job,
 * manual backfill batch). `referenceAmount` is the RTC amount used only to
 * pick a tier band.
 */
export interface AwardEvent {
  hunterId: string;
  actionKind: string;
  referenceAmount?: number | string | null;
  sourceRef: string;
  timestamp: string | Date;
  idempotencyKey?: string;
  wallet?: string;
}

export interface Award {
  idempotencyKey: string;
  hunterId: string;
  actionKind: ActionKind;
  referenceAmount: number | null;
  tier: TierCode | null;
  xp: number;
  sourceRef: string;
  description: string;
  degraded: boolean;
  timestamp: Date;
  recordedAt: Date;
}

export interface BadgeGrant {
  badgeId: string;
  /** Timestamp of the award at which the predicate first held, in timestamp order. */
  qualifiedAt: Date | null;
  /** When the ledger recorded the grant. */
  grantedAt: Date;
}

export interface LastAction {
  description: string;
  xp: number;
  timestamp: Date;
}

export interface HunterState {
  hunterId: string;
  wallet: string | null;
  xp: number;
  level: number;
  title: string;
  badges: BadgeGrant[];
  actionCounts: ActionCounts;
  awardCount: number;
  lastAction: LastAction | null;
  firstAwardAt: Date | null;
  updatedAt: Date;
}

export interface AppendResult {
  hunter: HunterState;
  award: Award;
  degraded: boolean;
  newBadges: string[];
  levelChanged: boolean;
}

export interface RejectedEvent {
  index: number;
  sourceRef: string | null;
  code: string;
  message: string;
}

export interface BackfillReport {
  imported: number;
  duplicates: RejectedEvent[];
  rejected: RejectedEvent[];
  degraded: string[];
  hunters: string[];
}

export interface RecomputeReport {
  hunters: number;
  repaired: string[];
  badgesGranted: Array<{ hunterId: string; badgeId: string }>;
}

export interface LedgerSnapshot {
  version: number;
  hunters: HunterState[];
}

export interface LedgerExport {
  formatVersion: 1;
  exportedAt: string;
  awards: SerializedAward[];
  hunters: SerializedHunter[];
}

export interface SerializedAward {
  seq: number;
  idempotencyKey: string;
  hunterId: string;
  actionKind: ActionKind;
  referenceAmount: number | null;
  tier: TierCode | null;
  xp: number;
  sourceRef: string;
  description: string;
  degraded: boolean;
  timestamp: string;
  recordedAt: string;
}

export interface SerializedHunter {
  hunterId: string;
  wallet: string | null;
  xp: number;
  level: number;
  title: string;
  badges: Array<{ badgeId: string; qualifiedAt: string | null; grantedAt: string }>;
  awardCount: number;
  lastAction: { description: string; xp: number; timestamp: string } | null;
  firstAwardAt: string | null;
}

export function emptyActionCounts(): ActionCounts {
  return {
    claim: 0,
    "pr-submitted": 0,
    "pr-merged": 0,
    "tutorial-accepted": 0,
    "bug-accepted": 0,
    "outreach-accepted": 0,
    "vintage-proof": 0,
    "first-completion-bonus": 0,
  };
}

export function isActionKind(value: string): value is ActionKind {
  return (ACTION_KINDS as readonly string[]).includes(value);
}
