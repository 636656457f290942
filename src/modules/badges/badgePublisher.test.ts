import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LedgerService } from "../ledger/ledger.service.js";
import { MemoryLedgerStore } from "../ledger/ledger.store.js";
import type { Award } from "../ledger/ledger.types.js";
import type { BadgeDocumentEntry } from "./badgeDocuments.js";
import { serializeBadgeDocument } from "./badgeDocuments.js";
import {
  BadgeDocumentStore,
  DocumentStoreTarget,
  FileSystemTarget,
  PublishQueue,
  type PublishTarget,
} from "./badgePublisher.js";

const now = new Date("2026-02-01T00:00:00Z");
const retry = { retries: 1, minTimeoutMs: 0, maxTimeoutMs: 0 };

function entry(key: string, message: string): BadgeDocumentEntry {
  return {
    key,
    document: { schemaVersion: 1, label: "Test", message, color: "blue", namedLogo: "star", logoColor: "white" },
  };
}

class FlakyTarget implements PublishTarget {
  readonly name = "flaky";
  attempts = 0;

  constructor(private failuresLeft: number) {}

  async publishGroup(): Promise<void> {
    this.attempts++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("upstream unavailable");
    }
  }
}

class RecoveringTarget implements PublishTarget {
  readonly name = "recovering";
  attempts = 0;

  constructor(
    private failuresLeft: number,
    private readonly inner: PublishTarget
  ) {}

  async publishGroup(group: string, entries: BadgeDocumentEntry[]): Promise<void> {
    this.attempts++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("upstream unavailable");
    }
    await this.inner.publishGroup(group, entries);
  }
}

/** Full-ledger reads take a while, leaving room for a commit to land mid-read. */
class SlowListStore extends MemoryLedgerStore {
  override async listAwards(hunterId?: string): Promise<Award[]> {
    if (hunterId === undefined) {
      await new Promise((resolve) => setTimeout(resolve, 20));
    }
    return super.listAwards(hunterId);
  }
}

describe("BadgeDocumentStore", () => {
  it("drops keys missing from the replacement group", () => {
    const store = new BadgeDocumentStore();
    store.replaceGroup("g", [entry("a", "1"), entry("b", "1")]);
    store.replaceGroup("other", [entry("c", "1")]);
    store.replaceGroup("g", [entry("a", "2")]);
    expect(store.keys()).toEqual(["a", "c"]);
    expect(store.get("a")).toBe(serializeBadgeDocument(entry("a", "2").document));
    expect(store.get("b")).toBeUndefined();
  });
});

describe("FileSystemTarget", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "badges-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes documents and removes stale files of the group", async () => {
    const target = new FileSystemTarget(dir);
    await target.publishGroup("hunter:h1", [entry("hunters/h1", "1"), entry("hunters/h1-age", "3d")]);
    expect(await readFile(path.join(dir, "hunters", "h1-age.json"), "utf-8")).toBe(
      serializeBadgeDocument(entry("hunters/h1-age", "3d").document)
    );

    await target.publishGroup("hunter:h1", [entry("hunters/h1", "2")]);
    await expect(readFile(path.join(dir, "hunters", "h1-age.json"), "utf-8")).rejects.toThrow();
    expect(await readFile(path.join(dir, "hunters", "h1.json"), "utf-8")).toBe(
      serializeBadgeDocument(entry("hunters/h1", "2").document)
    );
  });

  it("leaves the previous group in place when a file cannot be staged", async () => {
    const target = new FileSystemTarget(dir);
    await target.publishGroup("hunter:h1", [entry("hunters/h1", "1")]);
    await writeFile(path.join(dir, "blocker"), "not a directory", "utf-8");

    await expect(
      target.publishGroup("hunter:h1", [entry("hunters/h1", "2"), entry("blocker/h1-age", "2")])
    ).rejects.toThrow();
    expect(await readFile(path.join(dir, "hunters", "h1.json"), "utf-8")).toBe(
      serializeBadgeDocument(entry("hunters/h1", "1").document)
    );
    expect(await readdir(path.join(dir, "hunters"))).toEqual(["h1.json"]);
  });
});

describe("PublishQueue", () => {
  let ledger: LedgerService;
  let store: BadgeDocumentStore;

  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    ledger = new LedgerService({ store: new MemoryLedgerStore(), clock: () => now });
    store = new BadgeDocumentStore();
  });

  it("collects committed hunters once and publishes them on drain", async () => {
    const queue = new PublishQueue({ ledger, targets: [new DocumentStoreTarget(store)], retry, clock: () => now });
    queue.attach();

    await ledger.append({ hunterId: "h1", actionKind: "claim", sourceRef: "#1", timestamp: "2026-01-01" });
    await ledger.append({ hunterId: "h1", actionKind: "claim", sourceRef: "#2", timestamp: "2026-01-02" });
    expect(queue.pendingHunters()).toEqual(["h1"]);
    expect(queue.isGlobalDirty).toBe(true);

    const report = await queue.drain();
    expect(report).toEqual({ published: ["h1"], failed: [], globalPublished: true, globalFailed: false });
    expect(queue.pendingHunters()).toEqual([]);
    expect(queue.isGlobalDirty).toBe(false);
    expect(JSON.parse(store.get("hunters/h1") ?? "{}")).toEqual({
      schemaVersion: 1,
      label: "@h1 XP",
      message: "40 (L1 Starting Hunter)",
      color: "blue",
      namedLogo: "github",
      logoColor: "white",
    });
    expect(JSON.parse(store.get("top-hunter") ?? "{}").message).toBe("h1 (40 XP)");
  });

  it("republishes byte-identical documents when nothing changed", async () => {
    const queue = new PublishQueue({ ledger, targets: [new DocumentStoreTarget(store)], retry, clock: () => now });
    queue.attach();
    await ledger.append({ hunterId: "h1", actionKind: "claim", sourceRef: "#1", timestamp: "2026-01-01" });
    await queue.drain();
    const before = store.keys().map((k) => store.get(k));

    queue.enqueue(["h1"]);
    await queue.drain();
    expect(store.keys().map((k) => store.get(k))).toEqual(before);
  });

  it("keeps failed hunters pending without touching the ledger", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const flaky = new FlakyTarget(Number.POSITIVE_INFINITY);
    const queue = new PublishQueue({ ledger, targets: [flaky], retry, clock: () => now });
    queue.attach();

    const result = await ledger.append({ hunterId: "h1", actionKind: "claim", sourceRef: "#1", timestamp: "2026-01-01" });
    const report = await queue.drain();

    expect(report).toEqual({ published: [], failed: ["h1"], globalPublished: false, globalFailed: true });
    expect(flaky.attempts).toBe(4);
    expect(queue.pendingHunters()).toEqual(["h1"]);
    expect(queue.isGlobalDirty).toBe(true);
    expect(errorSpy).toHaveBeenCalledWith(
      "[Publisher] Publish failed for h1: upstream unavailable (target flaky); will retry on next drain"
    );
    expect((await ledger.getHunter("h1"))?.xp).toBe(result.hunter.xp);
  });

  it("retries a transient failure within one drain", async () => {
    const flaky = new FlakyTarget(1);
    const queue = new PublishQueue({ ledger, targets: [flaky], retry, clock: () => now });
    queue.enqueue(["h1"]);
    await ledger.registerHunter("h1", "RTCwallet");

    const report = await queue.drain();
    expect(report.published).toEqual(["h1"]);
    expect(report.globalPublished).toBe(true);
    expect(flaky.attempts).toBe(3);
  });

  it("shares a drain already in progress", async () => {
    const queue = new PublishQueue({ ledger, targets: [new DocumentStoreTarget(store)], retry, clock: () => now });
    queue.markGlobalDirty();
    const first = queue.drain();
    expect(queue.drain()).toBe(first);
    expect((await first).globalPublished).toBe(true);
  });

  it("drains after each commit when auto-drain is on", async () => {
    const queue = new PublishQueue({
      ledger,
      targets: [new DocumentStoreTarget(store)],
      retry,
      clock: () => now,
      autoDrain: true,
    });
    const detach = queue.attach();

    await ledger.append({ hunterId: "h2", actionKind: "tutorial-accepted", sourceRef: "#5", timestamp: "2026-01-03" });
    await vi.waitFor(() => {
      expect(store.get("hunters/h2-badge-tutorial-titan")).toBeDefined();
    });
    expect(JSON.parse(store.get("hunters/h2-badge-tutorial-titan") ?? "{}").message).toBe("earned");

    detach();
    await ledger.append({ hunterId: "h3", actionKind: "claim", sourceRef: "#6", timestamp: "2026-01-04" });
    expect(queue.pendingHunters()).toEqual([]);
  });

  it("publishes hunter and global documents from the same ledger version", async () => {
    ledger = new LedgerService({ store: new SlowListStore(), clock: () => now });
    const queue = new PublishQueue({ ledger, targets: [new DocumentStoreTarget(store)], retry, clock: () => now });
    queue.attach();
    await ledger.append({ hunterId: "h1", actionKind: "pr-merged", referenceAmount: 5, sourceRef: "#1", timestamp: "2026-01-01" });

    const draining = queue.drain();
    const appending = ledger.append({
      hunterId: "h1",
      actionKind: "pr-merged",
      referenceAmount: 5,
      sourceRef: "#2",
      timestamp: "2026-01-02",
    });
    await Promise.all([draining, appending]);

    expect(JSON.parse(store.get("hunters/h1") ?? "{}").message).toBe("100 (L1 Starting Hunter)");
    expect(JSON.parse(store.get("hunters/h1-bounties") ?? "{}").message).toBe("1");
    expect(JSON.parse(store.get("hunter-stats") ?? "{}").message).toBe("100 total");

    await queue.drain();
    expect(JSON.parse(store.get("hunters/h1") ?? "{}").message).toBe("200 (L2 Basic Hunter)");
    expect(JSON.parse(store.get("hunters/h1-bounties") ?? "{}").message).toBe("2");
  });

  it("re-drains failed work on its own when auto-drain is on", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const target = new RecoveringTarget(1, new DocumentStoreTarget(store));
    const queue = new PublishQueue({
      ledger,
      targets: [target],
      retry: { retries: 0, minTimeoutMs: 10, maxTimeoutMs: 20 },
      clock: () => now,
      autoDrain: true,
    });
    const detach = queue.attach();

    await ledger.append({ hunterId: "h1", actionKind: "claim", sourceRef: "#1", timestamp: "2026-01-01" });
    await vi.waitFor(() => {
      expect(store.get("hunters/h1")).toBeDefined();
    });
    expect(target.attempts).toBe(3);
    expect(queue.pendingHunters()).toEqual([]);
    detach();
  });

  it("stops re-draining once detached", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const flaky = new FlakyTarget(Number.POSITIVE_INFINITY);
    const queue = new PublishQueue({
      ledger,
      targets: [flaky],
      retry: { retries: 0, minTimeoutMs: 200, maxTimeoutMs: 400 },
      clock: () => now,
      autoDrain: true,
    });
    const detach = queue.attach();

    await ledger.append({ hunterId: "h1", actionKind: "claim", sourceRef: "#1", timestamp: "2026-01-01" });
    await vi.waitFor(() => {
      expect(flaky.attempts).toBe(2);
    });
    detach();
    await new Promise((resolve) => setTimeout(resolve, 300));
    expect(flaky.attempts).toBe(2);
    expect(queue.pendingHunters()).toEqual(["h1"]);
  });
});
