import { describe, it, expect } from "vitest";
import { DEFAULT_PROGRESSION_TABLES, levelForXp } from "../../config/progressionTables.js";
import { createDefaultBadgeRegistry } from "../../data/badgeRegistry.js";
import { badgeIds, buildBadgeView, deriveHunterState, evaluateBadges, sortAwards } from "./ledger.evaluator.js";
import { classifyEvent } from "./ledger.ingestor.js";
import type { Award } from "./ledger.types.js";

const tables = DEFAULT_PROGRESSION_TABLES;
const now = new Date("2026-06-01T00:00:00Z");

function award(hunterId: string, actionKind: string, sourceRef: string, timestamp: string, referenceAmount?: number): Award {
  return classifyEvent({ hunterId, actionKind, sourceRef, timestamp, referenceAmount }, tables, now).award;
}

describe("levelForXp", () => {
  it("picks the highest level whose threshold is met", () => {
    expect(levelForXp(0, tables.levels).level).toBe(1);
    expect(levelForXp(199, tables.levels).level).toBe(1);
    expect(levelForXp(200, tables.levels).title).toBe("Basic Hunter");
    expect(levelForXp(17999, tables.levels).level).toBe(9);
    expect(levelForXp(18000, tables.levels).title).toBe("Legendary Hunter");
    expect(levelForXp(1_000_000, tables.levels).level).toBe(10);
  });

  it("is monotone in XP", () => {
    let last = 0;
    for (let xp = 0; xp <= 20000; xp += 50) {
      const level = levelForXp(xp, tables.levels).level;
      expect(level).toBeGreaterThanOrEqual(last);
      last = level;
    }
  });
});

describe("sortAwards", () => {
  it("orders by timestamp then idempotency key", () => {
    const a = { ...award("h", "claim", "#1", "2026-01-02T00:00:00Z"), idempotencyKey: "b" };
    const b = { ...award("h", "claim", "#2", "2026-01-02T00:00:00Z"), idempotencyKey: "a" };
    const c = award("h", "claim", "#3", "2026-01-01T00:00:00Z");
    expect(sortAwards([a, b, c]).map((x) => x.sourceRef)).toEqual(["#3", "#2", "#1"]);
  });
});

describe("evaluateBadges", () => {
  const registry = createDefaultBadgeRegistry();

  it("grants bug-slayer for a critical-tier PR", () => {
    const view = buildBadgeView("h", [award("h", "pr-submitted", "#1", "2026-01-01", 500)]);
    expect(evaluateBadges(view, registry)).toEqual(["bug-slayer"]);
  });

  it("needs three awards inside seven days for streak-master", () => {
    const spread = sortAwards([
      award("h", "claim", "#1", "2026-01-01"),
      award("h", "claim", "#2", "2026-01-05"),
      award("h", "claim", "#3", "2026-01-09"),
    ]);
    expect(evaluateBadges(buildBadgeView("h", spread), registry)).not.toContain("streak-master");

    const tight = sortAwards([...spread, award("h", "claim", "#4", "2026-01-10")]);
    expect(evaluateBadges(buildBadgeView("h", tight), registry)).toContain("streak-master");
  });

  it("grants agent-overlord only to agents with 500 XP", () => {
    const awards = [
      award("my-agent", "tutorial-accepted", "#1", "2026-01-01"),
      award("my-agent", "tutorial-accepted", "#2", "2026-02-01"),
      award("my-agent", "tutorial-accepted", "#3", "2026-03-01"),
      award("my-agent", "bug-accepted", "#4", "2026-04-01"),
    ];
    expect(evaluateBadges(buildBadgeView("my-agent", awards), registry)).toContain("agent-overlord");
    const human = awards.map((a) => ({ ...a, hunterId: "alice" }));
    expect(evaluateBadges(buildBadgeView("alice", human), registry)).not.toContain("agent-overlord");
  });
});

describe("deriveHunterState", () => {
  const registry = createDefaultBadgeRegistry();

  it("derives totals, level, last action and first award", () => {
    const awards = [
      award("h1", "pr-merged", "#42", "2026-01-03T00:00:00Z", 25),
      award("h1", "claim", "#42", "2026-01-01T00:00:00Z"),
      award("h1", "pr-submitted", "#42", "2026-01-02T00:00:00Z", 25),
    ];
    const state = deriveHunterState({ hunterId: "h1", awards, registry, tables, now });

    expect(state.xp).toBe(220);
    expect(state.level).toBe(2);
    expect(state.title).toBe("Basic Hunter");
    expect(state.awardCount).toBe(3);
    expect(state.actionCounts["pr-merged"]).toBe(1);
    expect(state.firstAwardAt?.toISOString()).toBe("2026-01-01T00:00:00.000Z");
    expect(state.lastAction?.description).toBe("PR merged #42 (standard tier, 25 RTC)");
    expect(state.wallet).toBeNull();
    expect(state.updatedAt).toBe(now);
  });

  it("records the qualifying award time and the grant time", () => {
    const awards = [
      award("h1", "claim", "#1", "2026-01-01T00:00:00Z"),
      award("h1", "pr-merged", "#1", "2026-01-03T00:00:00Z", 25),
    ];
    const state = deriveHunterState({ hunterId: "h1", awards, registry, tables, now });
    expect(state.badges).toEqual([
      { badgeId: "first-blood", qualifiedAt: new Date("2026-01-03T00:00:00Z"), grantedAt: now },
    ]);
  });

  it("keeps previously granted badges even when the predicate no longer holds", () => {
    const previous = deriveHunterState({
      hunterId: "h1",
      awards: [award("h1", "claim", "#1", "2026-01-01")],
      registry,
      tables,
      now,
    });
    const withLegacy = {
      ...previous,
      badges: [{ badgeId: "retired-badge", qualifiedAt: null, grantedAt: new Date("2025-01-01T00:00:00Z") }],
    };
    const next = deriveHunterState({
      hunterId: "h1",
      awards: [award("h1", "claim", "#1", "2026-01-01"), award("h1", "claim", "#2", "2026-01-02")],
      previous: withLegacy,
      registry,
      tables,
      now,
    });
    expect(badgeIds(next)).toEqual(["retired-badge"]);
  });

  it("does not move the grant time of an existing badge", () => {
    const first = deriveHunterState({
      hunterId: "h1",
      awards: [award("h1", "pr-merged", "#1", "2026-01-01", 5)],
      registry,
      tables,
      now,
    });
    const later = new Date("2026-07-01T00:00:00Z");
    const second = deriveHunterState({
      hunterId: "h1",
      awards: [award("h1", "pr-merged", "#1", "2026-01-01", 5), award("h1", "pr-merged", "#2", "2026-01-20", 5)],
      previous: first,
      registry,
      tables,
      now: later,
    });
    expect(second.badges).toEqual([
      { badgeId: "first-blood", qualifiedAt: new Date("2026-01-01T00:00:00Z"), grantedAt: now },
    ]);
    expect(second.updatedAt).toBe(later);
  });

  it("takes the wallet from input, then previous state", () => {
    const base = deriveHunterState({ hunterId: "h1", awards: [], wallet: "RTCabc", registry, tables, now });
    expect(base.wallet).toBe("RTCabc");
    const kept = deriveHunterState({ hunterId: "h1", awards: [], previous: base, registry, tables, now });
    expect(kept.wallet).toBe("RTCabc");
    const cleared = deriveHunterState({ hunterId: "h1", awards: [], previous: base, wallet: null, registry, tables, now });
    expect(cleared.wallet).toBeNull();
  });

  it("gives the same level for different award sequences with equal XP", () => {
    const a = deriveHunterState({
      hunterId: "h1",
      awards: [award("h1", "tutorial-accepted", "#1", "2026-01-01"), award("h1", "bug-accepted", "#2", "2026-01-02")],
      registry,
      tables,
      now,
    });
    const b = deriveHunterState({
      hunterId: "h1",
      awards: [
        award("h1", "pr-merged", "#3", "2026-01-01", 25),
        award("h1", "pr-submitted", "#3", "2025-12-31", 25),
        award("h1", "outreach-accepted", "#4", "2025-12-01"),
        award("h1", "claim", "#3", "2025-11-30"),
      ],
      registry,
      tables,
      now,
    });
    expect(a.xp).toBe(250);
    expect(b.xp).toBe(250);
    expect(a.level).toBe(2);
    expect(b.level).toBe(2);
  });
});
