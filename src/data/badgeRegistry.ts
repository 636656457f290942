// src/data/badgeRegistry.ts

import type { ActionCounts, Award } from "../modules/ledger/ledger.types.js";
import { ConfigurationError } from "../modules/ledger/ledger.errors.js";

export interface BadgeStyle {
  color: string;
  namedLogo: string;
  logoColor: string;
}

/**
 * Everything a badge predicate may look at. `awards` is sorted by
 * timestamp, so windowed predicates see the same order no matter how
 * the awards arrived.
 */
export interface BadgeView {
  hunterId: string;
  xp: number;
  awards: readonly Award[];
  actionCounts: ActionCounts;
}

export interface BadgeDefinition {
  id: string;
  name: string;
  description: string;
  style: BadgeStyle;
  predicate: (view: BadgeView) => boolean;
}

const BADGE_ID_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

const DAY_MS = 24 * 60 * 60 * 1000;

function minXp(threshold: number) {
  return (view: BadgeView) => view.xp >= threshold;
}

function hasAction(kind: keyof ActionCounts) {
  return (view: BadgeView) => view.actionCounts[kind] >= 1;
}

/** At least `count` awards inside any window of `days` days. */
export function awardsWithinWindow(count: number, days: number) {
  const windowMs = days * DAY_MS;
  return (view: BadgeView) => {
    const times = view.awards.map((a) => a.timestamp.getTime());
    for (let i = count - 1; i < times.length; i++) {
      if (times[i] - times[i - count + 1] <= windowMs) return true;
    }
    return false;
  };
}

export const DEFAULT_BADGES: BadgeDefinition[] = [
  {
    id: "first-blood",
    name: "First Blood",
    description: "First merged pull request",
    style: { color: "red", namedLogo: "git", logoColor: "white" },
    predicate: hasAction("pr-merged"),
  },
  {
    id: "rising-hunter",
    name: "Rising Hunter",
    description: "Reached 1000 XP",
    style: { color: "orange", namedLogo: "rocket", logoColor: "white" },
    predicate: minXp(1000),
  },
  {
    id: "multiplier-hunter",
    name: "Multiplier Hunter",
    description: "Reached 2000 XP",
    style: { color: "yellow", namedLogo: "star", logoColor: "black" },
    predicate: minXp(2000),
  },
  {
    id: "veteran-hunter",
    name: "Veteran Hunter",
    description: "Reached 5500 XP",
    style: { color: "purple", namedLogo: "shield", logoColor: "white" },
    predicate: minXp(5500),
  },
  {
    id: "legendary-hunter",
    name: "Legendary Hunter",
    description: "Reached 18000 XP",
    style: { color: "gold", namedLogo: "crown", logoColor: "black" },
    predicate: minXp(18000),
  },
  {
    id: "vintage-veteran",
    name: "Vintage Veteran",
    description: "Submitted a vintage hardware proof",
    style: { color: "purple", namedLogo: "apple", logoColor: "white" },
    predicate: hasAction("vintage-proof"),
  },
  {
    id: "tutorial-titan",
    name: "Tutorial Titan",
    description: "Tutorial or docs contribution accepted",
    style: { color: "blue", namedLogo: "book", logoColor: "white" },
    predicate: hasAction("tutorial-accepted"),
  },
  {
    id: "bug-slayer",
    name: "Bug Slayer",
    description: "Bug report accepted or critical-tier PR",
    style: { color: "darkred", namedLogo: "bug", logoColor: "white" },
    predicate: (view) =>
      view.actionCounts["bug-accepted"] >= 1 || view.awards.some((a) => a.tier === "critical"),
  },
  {
    id: "outreach-pro",
    name: "Outreach Pro",
    description: "Outreach contribution accepted",
    style: { color: "teal", namedLogo: "twitter", logoColor: "white" },
    predicate: hasAction("outreach-accepted"),
  },
  {
    id: "streak-master",
    name: "Streak Master",
    description: "Three awards within seven days",
    style: { color: "green", namedLogo: "fire", logoColor: "white" },
    predicate: awardsWithinWindow(3, 7),
  },
  {
    id: "agent-overlord",
    name: "Agent Overlord",
    description: "Autonomous agent with 500 XP",
    style: { color: "cyan", namedLogo: "robot", logoColor: "white" },
    predicate: (view) => view.hunterId.toLowerCase().includes("agent") && view.xp >= 500,
  },
];

export class BadgeRegistry {
  private readonly defs = new Map<string, BadgeDefinition>();

  constructor(definitions: BadgeDefinition[] = []) {
    for (const def of definitions) {
      this.register(def);
    }
  }

  /**
   * Adding a badge later is supported; the next recompute pass grants it
   * to every hunter whose history already satisfies it.
   */
  register(def: BadgeDefinition): void {
    if (!BADGE_ID_PATTERN.test(def.id)) {
      throw new ConfigurationError(`Invalid badge id '${def.id}'`);
    }
    if (this.defs.has(def.id)) {
      throw new ConfigurationError(`Duplicate badge id '${def.id}'`);
    }
    if (!def.name.trim()) {
      throw new ConfigurationError(`Badge '${def.id}' has no name`);
    }
    this.defs.set(def.id, def);
  }

  get(id: string): BadgeDefinition | undefined {
    return this.defs.get(id);
  }

  has(id: string): boolean {
    return this.defs.has(id);
  }

  list(): BadgeDefinition[] {
    return [...this.defs.values()];
  }
}

export function createDefaultBadgeRegistry(): BadgeRegistry {
  return new BadgeRegistry(DEFAULT_BADGES);
}
