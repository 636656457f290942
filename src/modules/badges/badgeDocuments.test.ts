import { describe, it, expect } from "vitest";
import { DEFAULT_PROGRESSION_TABLES } from "../../config/progressionTables.js";
import { createDefaultBadgeRegistry } from "../../data/badgeRegistry.js";
import { renderLeaderboard } from "../leaderboards/leaderboard.renderer.js";
import { deriveHunterState } from "../ledger/ledger.evaluator.js";
import { classifyEvent } from "../ledger/ledger.ingestor.js";
import type { Award } from "../ledger/ledger.types.js";
import {
  buildGlobalDocuments,
  buildHunterDocuments,
  formatAccountAge,
  serializeBadgeDocument,
  slugifyHunter,
  weeklyGrowth,
} from "./badgeDocuments.js";

const registry = createDefaultBadgeRegistry();
const tables = DEFAULT_PROGRESSION_TABLES;
const now = new Date("2026-06-01T00:00:00Z");

function award(hunterId: string, actionKind: string, sourceRef: string, timestamp: string, referenceAmount?: number): Award {
  return classifyEvent({ hunterId, actionKind, sourceRef, timestamp, referenceAmount }, tables, now).award;
}

const H1_AWARDS = [
  award("h1", "claim", "#42", "2026-01-01T00:00:00Z"),
  award("h1", "pr-submitted", "#42", "2026-01-05T00:00:00Z", 25),
  award("h1", "pr-merged", "#42", "2026-01-10T00:00:00Z", 25),
];
const H1 = deriveHunterState({ hunterId: "h1", awards: H1_AWARDS, registry, tables, now });

describe("slugifyHunter", () => {
  it("lowercases and strips the handle prefix", () => {
    expect(slugifyHunter("@Alice_Bob")).toBe("alice_bob");
    expect(slugifyHunter("  Weird Name!! ")).toBe("weird-name");
    expect(slugifyHunter("agent.v2")).toBe("agent.v2");
    expect(slugifyHunter("@@@")).toBe("unknown");
  });
});

describe("formatAccountAge", () => {
  it("counts whole UTC days up to the publish day", () => {
    const publish = new Date("2026-01-02T01:00:00Z");
    expect(formatAccountAge(null, publish)).toBe("unknown");
    expect(formatAccountAge(new Date("2026-01-01T23:00:00Z"), publish)).toBe("1d");
    expect(formatAccountAge(new Date("2025-11-18T12:00:00Z"), publish)).toBe("1m 15d");
    expect(formatAccountAge(new Date("2024-11-28T00:00:00Z"), publish)).toBe("1y 1m");
  });
});

describe("serializeBadgeDocument", () => {
  it("uses a fixed key order and a trailing newline", () => {
    const text = serializeBadgeDocument({
      logoColor: "white",
      namedLogo: "users",
      color: "teal",
      message: "3",
      label: "Active Hunters",
      schemaVersion: 1,
    });
    expect(text).toBe(
      '{\n  "schemaVersion": 1,\n  "label": "Active Hunters",\n  "message": "3",\n  "color": "teal",\n  "namedLogo": "users",\n  "logoColor": "white"\n}\n'
    );
  });
});

describe("buildHunterDocuments", () => {
  const publishDay = new Date("2026-01-31T08:00:00Z");
  const docs = buildHunterDocuments(H1, H1_AWARDS, registry, publishDay);
  const byKey = new Map(docs.map((d) => [d.key, d.document]));

  it("publishes the core metrics and one document per registered badge", () => {
    expect(docs).toHaveLength(4 + registry.list().length);
    expect(byKey.get("hunters/h1")).toEqual({
      schemaVersion: 1,
      label: "@h1 XP",
      message: "220 (L2 Basic Hunter)",
      color: "blue",
      namedLogo: "github",
      logoColor: "white",
    });
    expect(byKey.get("hunters/h1-bounties")?.message).toBe("1");
    expect(byKey.get("hunters/h1-bounties")?.color).toBe("brightgreen");
    expect(byKey.get("hunters/h1-rtc")?.message).toBe("25 RTC");
    expect(byKey.get("hunters/h1-age")?.message).toBe("30d");
  });

  it("marks earned and locked badges", () => {
    expect(byKey.get("hunters/h1-badge-first-blood")).toEqual({
      schemaVersion: 1,
      label: "First Blood",
      message: "earned",
      color: "red",
      namedLogo: "git",
      logoColor: "white",
    });
    expect(byKey.get("hunters/h1-badge-bug-slayer")).toEqual({
      schemaVersion: 1,
      label: "Bug Slayer",
      message: "locked",
      color: "lightgrey",
      namedLogo: "bug",
      logoColor: "white",
    });
  });

  it("is byte-identical when rebuilt on the same day", () => {
    const later = buildHunterDocuments(H1, H1_AWARDS, registry, new Date("2026-01-31T23:59:00Z"));
    expect(later.map((d) => serializeBadgeDocument(d.document))).toEqual(docs.map((d) => serializeBadgeDocument(d.document)));
  });
});

describe("weeklyGrowth", () => {
  it("sums XP from the publish day and the six days before it", () => {
    const awards = [
      award("a", "claim", "#1", "2026-01-03T23:59:00Z"),
      award("a", "tutorial-accepted", "#2", "2026-01-04T00:00:00Z"),
      award("b", "bug-accepted", "#3", "2026-01-10T23:00:00Z"),
      award("b", "claim", "#4", "2026-01-11T00:00:00Z"),
    ];
    expect(weeklyGrowth(awards, new Date("2026-01-10T15:00:00Z"))).toBe(250);
  });
});

describe("buildGlobalDocuments", () => {
  it("describes an empty population", () => {
    const docs = new Map(buildGlobalDocuments([], [], new Date("2026-02-01T10:00:00Z")).map((d) => [d.key, d.document]));
    expect([...docs.keys()]).toEqual([
      "hunter-stats",
      "top-hunter",
      "top-3-hunters",
      "active-hunters",
      "legendary-hunters",
      "weekly-growth",
      "updated-at",
    ]);
    expect(docs.get("top-hunter")).toEqual({
      schemaVersion: 1,
      label: "Top Hunter",
      message: "none yet",
      color: "lightgrey",
      namedLogo: "crown",
      logoColor: "white",
    });
    expect(docs.get("weekly-growth")?.message).toBe("+0");
    expect(docs.get("weekly-growth")?.namedLogo).toBe("dash");
    expect(docs.get("updated-at")?.message).toBe("2026-02-01");
  });

  it("summarizes the leaderboard", () => {
    const h2Awards = [award("h2", "tutorial-accepted", "#1", "2026-01-08T00:00:00Z")];
    const h2 = deriveHunterState({ hunterId: "h2", awards: h2Awards, registry, tables, now });
    const entries = renderLeaderboard([h2, H1]);
    const docs = new Map(
      buildGlobalDocuments(entries, [...H1_AWARDS, ...h2Awards], new Date("2026-01-10T12:00:00Z")).map((d) => [d.key, d.document])
    );
    expect(docs.get("hunter-stats")?.message).toBe("370 total");
    expect(docs.get("top-hunter")?.message).toBe("h1 (220 XP)");
    expect(docs.get("top-hunter")?.logoColor).toBe("black");
    expect(docs.get("top-3-hunters")?.message).toBe("h1, h2");
    expect(docs.get("active-hunters")?.message).toBe("2");
    expect(docs.get("legendary-hunters")?.message).toBe("0");
    expect(docs.get("weekly-growth")?.message).toBe("+350");
  });
});
