// src/modules/leaderboards/leaderboard.renderer.ts
// Leaderboard read-model: a full re-sort of the hunter population on every render

import type { BadgeRegistry, BadgeStyle } from "../../data/badgeRegistry.js";
import type { LedgerService } from "../ledger/ledger.service.js";
import type { HunterState, LastAction } from "../ledger/ledger.types.js";

export const LEGENDARY_LEVEL = 10;

export interface LeaderboardEntry {
  rank: number;
  hunterId: string;
  wallet: string | null;
  xp: number;
  level: number;
  title: string;
  badges: string[];
  lastAction: LastAction | null;
  firstAwardAt: Date | null;
  awardCount: number;
}

export interface LeaderboardSummary {
  totalXp: number;
  activeHunters: number;
  legendaryHunters: number;
  topHunter: { hunterId: string; xp: number } | null;
  top3: string[];
}

export interface RenderOptions {
  limit?: number;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * XP descending, then earliest first award, then hunter id. Hunters with
 * no awards yet sort after everyone with the same XP.
 */
export function compareHunters(a: HunterState, b: HunterState): number {
  if (a.xp !== b.xp) return b.xp - a.xp;
  const fa = a.firstAwardAt ? a.firstAwardAt.getTime() : Number.POSITIVE_INFINITY;
  const fb = b.firstAwardAt ? b.firstAwardAt.getTime() : Number.POSITIVE_INFINITY;
  if (fa !== fb) return fa < fb ? -1 : 1;
  return compareIds(a.hunterId, b.hunterId);
}

export function renderLeaderboard(hunters: readonly HunterState[], options: RenderOptions = {}): LeaderboardEntry[] {
  const ranked = [...hunters].sort(compareHunters).map((h, index) => ({
    rank: index + 1,
    hunterId: h.hunterId,
    wallet: h.wallet,
    xp: h.xp,
    level: h.level,
    title: h.title,
    badges: h.badges.map((g) => g.badgeId),
    lastAction: h.lastAction,
    firstAwardAt: h.firstAwardAt,
    awardCount: h.awardCount,
  }));
  return options.limit !== undefined ? ranked.slice(0, options.limit) : ranked;
}

export function summarizeLeaderboard(entries: readonly LeaderboardEntry[]): LeaderboardSummary {
  const top = entries[0];
  return {
    totalXp: entries.reduce((sum, e) => sum + e.xp, 0),
    activeHunters: entries.filter((e) => e.awardCount > 0).length,
    legendaryHunters: entries.filter((e) => e.level >= LEGENDARY_LEVEL).length,
    topHunter: top ? { hunterId: top.hunterId, xp: top.xp } : null,
    top3: entries.slice(0, 3).map((e) => e.hunterId),
  };
}

// ============================================================================
// MARKDOWN TRACKER
// ============================================================================

const FALLBACK_STYLE: BadgeStyle = { color: "blue", namedLogo: "star", logoColor: "white" };

export const TRACKER_HEADER = "| Rank | Hunter | Wallet | XP | Level | Title | Badges | Last Action |";
const TRACKER_DIVIDER = "|---:|---|---|---:|---:|---|---|---|";

export function shieldsBadgeUrl(name: string, style: BadgeStyle): string {
  return (
    `https://img.shields.io/badge/${encodeURIComponent(name)}-${style.color}` +
    `?style=flat-square&logo=${style.namedLogo}&logoColor=${style.logoColor}`
  );
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function formatLastAction(lastAction: LastAction | null): string {
  if (!lastAction) return "-";
  const day = lastAction.timestamp.toISOString().slice(0, 10);
  return `${day}: +${lastAction.xp} XP (${lastAction.description})`;
}

function formatBadges(badgeIds: string[], registry: BadgeRegistry): string {
  if (badgeIds.length === 0) return "-";
  return badgeIds
    .map((id) => {
      const def = registry.get(id);
      const name = def?.name ?? id;
      return `![${name}](${shieldsBadgeUrl(name, def?.style ?? FALLBACK_STYLE)})`;
    })
    .join(" ");
}

export function renderTrackerRow(entry: LeaderboardEntry, registry: BadgeRegistry): string {
  const cells = [
    String(entry.rank),
    `@${entry.hunterId}`,
    entry.wallet ?? "_TBD_",
    String(entry.xp),
    String(entry.level),
    entry.title,
    formatBadges(entry.badges, registry),
    formatLastAction(entry.lastAction),
  ];
  return `| ${cells.map(escapeCell).join(" | ")} |`;
}

export function renderLeaderboardMarkdown(
  entries: readonly LeaderboardEntry[],
  registry: BadgeRegistry,
  generatedAt?: Date
): string {
  const lines = ["# Bounty Hunter XP Tracker", ""];
  if (generatedAt) {
    lines.push(`_Last updated: ${generatedAt.toISOString().slice(0, 10)}_`, "");
  }
  lines.push(TRACKER_HEADER, TRACKER_DIVIDER);
  if (entries.length === 0) {
    lines.push("| - | _TBD_ | _TBD_ | 0 | 1 | Starting Hunter | - | - |");
  } else {
    for (const entry of entries) {
      lines.push(renderTrackerRow(entry, registry));
    }
  }
  return lines.join("\n") + "\n";
}

// ============================================================================
// CACHED SERVICE
// ============================================================================

interface CachedBoard {
  version: number;
  entries: LeaderboardEntry[];
}

/**
 * Renders from a ledger snapshot and reuses the result until the ledger
 * version moves.
 */
export class LeaderboardService {
  private cache: CachedBoard | null = null;

  constructor(private readonly ledger: LedgerService) {}

  async getEntries(options: RenderOptions = {}): Promise<LeaderboardEntry[]> {
    let board = this.cache;
    if (!board || board.version !== this.ledger.currentVersion) {
      const snapshot = await this.ledger.snapshot();
      board = { version: snapshot.version, entries: renderLeaderboard(snapshot.hunters) };
      this.cache = board;
    }
    return options.limit !== undefined ? board.entries.slice(0, options.limit) : board.entries;
  }

  async getSummary(): Promise<LeaderboardSummary> {
    return summarizeLeaderboard(await this.getEntries());
  }

  async getMarkdown(generatedAt?: Date): Promise<string> {
    return renderLeaderboardMarkdown(await this.getEntries(), this.ledger.registry, generatedAt);
  }
}
