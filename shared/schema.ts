import { sql } from "drizzle-orm";
import { pgTable, text, serial, integer, boolean, json, timestamp, doublePrecision, index, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================================================
// AWARD LEDGER (append-only, source of truth)
// ============================================================================

/**
 * One row per award. Rows are never updated; `id` preserves arrival order.
 */
export const awards = pgTable("awards", {
  id: serial("id").primaryKey(),
  idempotencyKey: text("idempotency_key").notNull(),
  hunterId: text("hunter_id").notNull(),
  actionKind: text("action_kind").notNull(), // claim, pr-submitted, pr-merged, ...
  referenceAmount: doublePrecision("reference_amount"), // RTC, classification input only
  tier: text("tier"), // micro, standard, major, critical (tiered actions only)
  xp: integer("xp").notNull(),
  sourceRef: text("source_ref").notNull(),
  description: text("description").notNull(),
  degraded: boolean("degraded").default(false).notNull(),
  occurredAt: timestamp("occurred_at", { withTimezone: true }).notNull(),
  recordedAt: timestamp("recorded_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  idempotencyKeyIdx: uniqueIndex("awards_idempotency_key_idx").on(table.idempotencyKey),
  hunterIdIdx: index("awards_hunter_id_idx").on(table.hunterId),
  occurredAtIdx: index("awards_occurred_at_idx").on(table.occurredAt),
}));

export const insertAwardSchema = createInsertSchema(awards).omit({ id: true });
export type InsertAward = z.infer<typeof insertAwardSchema>;
export type AwardRow = typeof awards.$inferSelect;

// ============================================================================
// HUNTER SNAPSHOTS (cached derived state, rebuildable from awards)
// ============================================================================

export interface StoredBadgeGrant {
  badgeId: string;
  qualifiedAt: string | null;
  grantedAt: string;
}

export interface StoredLastAction {
  description: string;
  xp: number;
  timestamp: string;
}

export const hunters = pgTable("hunters", {
  hunterId: text("hunter_id").primaryKey(),
  wallet: text("wallet"),
  xp: integer("xp").notNull().default(0),
  level: integer("level").notNull().default(1),
  title: text("title").notNull(),
  badges: json("badges").$type<StoredBadgeGrant[]>().notNull(),
  actionCounts: json("action_counts").$type<Record<string, number>>().notNull(),
  awardCount: integer("award_count").notNull().default(0),
  lastAction: json("last_action").$type<StoredLastAction | null>(),
  firstAwardAt: timestamp("first_award_at", { withTimezone: true }),
  updatedAt: timestamp("updated_at", { withTimezone: true }).default(sql`CURRENT_TIMESTAMP`).notNull(),
}, (table) => ({
  xpIdx: index("hunters_xp_idx").on(table.xp),
}));

// json columns carry typed payloads, so the insert type comes from drizzle directly
export type InsertHunter = typeof hunters.$inferInsert;
export type HunterRow = typeof hunters.$inferSelect;
