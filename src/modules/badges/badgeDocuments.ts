// src/modules/badges/badgeDocuments.ts
// shields.io endpoint documents derived from ledger state

import type { BadgeRegistry } from "../../data/badgeRegistry.js";
import type { LeaderboardEntry } from "../leaderboards/leaderboard.renderer.js";
import { LEGENDARY_LEVEL } from "../leaderboards/leaderboard.renderer.js";
import type { ActionKind, Award, HunterState } from "../ledger/ledger.types.js";

export interface BadgeDocument {
  schemaVersion: 1;
  label: string;
  message: string;
  color: string;
  namedLogo: string;
  logoColor: string;
}

export interface BadgeDocumentEntry {
  key: string;
  document: BadgeDocument;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Actions that complete a bounty, as opposed to claiming or submitting one. */
export const COMPLETION_ACTIONS: readonly ActionKind[] = [
  "pr-merged",
  "tutorial-accepted",
  "bug-accepted",
  "outreach-accepted",
  "vintage-proof",
];

export function slugifyHunter(hunterId: string): string {
  const slug = hunterId
    .replace(/^@+/, "")
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "unknown";
}

export function colorForLevel(level: number): string {
  if (level >= 10) return "gold";
  if (level >= 7) return "purple";
  if (level >= 5) return "yellow";
  if (level >= 4) return "orange";
  return "blue";
}

function doc(label: string, message: string, color: string, namedLogo: string, logoColor = "white"): BadgeDocument {
  return { schemaVersion: 1, label, message, color, namedLogo, logoColor };
}

/** Fixed key order, two-space indent, trailing newline. */
export function serializeBadgeDocument(document: BadgeDocument): string {
  const ordered: BadgeDocument = {
    schemaVersion: document.schemaVersion,
    label: document.label,
    message: document.message,
    color: document.color,
    namedLogo: document.namedLogo,
    logoColor: document.logoColor,
  };
  return JSON.stringify(ordered, null, 2) + "\n";
}

function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

export function formatAccountAge(firstAwardAt: Date | null, publishDay: Date): string {
  if (!firstAwardAt) return "unknown";
  const days = Math.max(0, Math.floor((startOfUtcDay(publishDay) - startOfUtcDay(firstAwardAt)) / DAY_MS));
  if (days > 365) return `${Math.floor(days / 365)}y ${Math.floor((days % 365) / 30)}m`;
  if (days > 30) return `${Math.floor(days / 30)}m ${days % 30}d`;
  return `${days}d`;
}

function formatRtc(amount: number): string {
  return String(Math.round(amount * 100) / 100);
}

export function countCompletedBounties(awards: readonly Award[]): number {
  return awards.filter((a) => COMPLETION_ACTIONS.includes(a.actionKind)).length;
}

export function sumRtcEarned(awards: readonly Award[]): number {
  return awards
    .filter((a) => COMPLETION_ACTIONS.includes(a.actionKind))
    .reduce((sum, a) => sum + (a.referenceAmount ?? 0), 0);
}

export function hunterDocumentKey(hunterId: string, suffix = ""): string {
  return `hunters/${slugifyHunter(hunterId)}${suffix}`;
}

export function buildHunterDocuments(
  hunter: HunterState,
  awards: readonly Award[],
  registry: BadgeRegistry,
  publishDay: Date
): BadgeDocumentEntry[] {
  const completed = countCompletedBounties(awards);
  const rtc = sumRtcEarned(awards);
  const earned = new Set(hunter.badges.map((g) => g.badgeId));

  const entries: BadgeDocumentEntry[] = [
    {
      key: hunterDocumentKey(hunter.hunterId),
      document: doc(`@${hunter.hunterId} XP`, `${hunter.xp} (L${hunter.level} ${hunter.title})`, colorForLevel(hunter.level), "github"),
    },
    {
      key: hunterDocumentKey(hunter.hunterId, "-bounties"),
      document: doc("Bounties", String(completed), completed > 0 ? "brightgreen" : "blue", "check-circle"),
    },
    {
      key: hunterDocumentKey(hunter.hunterId, "-rtc"),
      document: doc("RTC Earned", `${formatRtc(rtc)} RTC`, rtc > 0 ? "orange" : "blue", "bitcoin"),
    },
    {
      key: hunterDocumentKey(hunter.hunterId, "-age"),
      document: doc("Account Age", formatAccountAge(hunter.firstAwardAt, publishDay), "blue", "clock"),
    },
  ];

  for (const def of registry.list()) {
    const has = earned.has(def.id);
    entries.push({
      key: hunterDocumentKey(hunter.hunterId, `-badge-${def.id}`),
      document: has
        ? doc(def.name, "earned", def.style.color, def.style.namedLogo, def.style.logoColor)
        : doc(def.name, "locked", "lightgrey", def.style.namedLogo),
    });
  }
  return entries;
}

/** XP awarded on the publish day and the six days before it. */
export function weeklyGrowth(awards: readonly Award[], publishDay: Date): number {
  const end = startOfUtcDay(publishDay) + DAY_MS;
  const start = end - 7 * DAY_MS;
  return awards
    .filter((a) => {
      const t = a.timestamp.getTime();
      return t >= start && t < end;
    })
    .reduce((sum, a) => sum + a.xp, 0);
}

export function buildGlobalDocuments(
  entries: readonly LeaderboardEntry[],
  awards: readonly Award[],
  publishDay: Date
): BadgeDocumentEntry[] {
  const totalXp = entries.reduce((sum, e) => sum + e.xp, 0);
  const active = entries.filter((e) => e.awardCount > 0).length;
  const legendary = entries.filter((e) => e.level >= LEGENDARY_LEVEL).length;
  const growth = weeklyGrowth(awards, publishDay);
  const top = entries[0];

  const topMessage = top ? `${top.hunterId} (${top.xp} XP)` : "none yet";
  const top3Message = top ? entries.slice(0, 3).map((e) => e.hunterId).join(", ") : "none yet";

  return [
    { key: "hunter-stats", document: doc("Bounty Hunter XP", `${totalXp} total`, totalXp > 0 ? "orange" : "blue", "rust") },
    { key: "top-hunter", document: doc("Top Hunter", topMessage, top ? "gold" : "lightgrey", "crown", top ? "black" : "white") },
    { key: "top-3-hunters", document: doc("Leaders", top3Message, top ? "gold" : "lightgrey", "crown") },
    { key: "active-hunters", document: doc("Active Hunters", String(active), "teal", "users") },
    {
      key: "legendary-hunters",
      document: doc("Legendary Hunters", String(legendary), legendary > 0 ? "gold" : "lightgrey", "crown", legendary > 0 ? "black" : "white"),
    },
    {
      key: "weekly-growth",
      document: doc("Weekly XP", `+${growth}`, growth > 0 ? "brightgreen" : "blue", growth > 0 ? "trending-up" : "dash"),
    },
    { key: "updated-at", document: doc("XP Updated", publishDay.toISOString().slice(0, 10), "blue", "clockify") },
  ];
}
