// scripts/backfillAwards.ts
// Usage: tsx scripts/backfillAwards.ts <events.json> [--dry-run]

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { PgLedgerStore } from "../src/modules/ledger/ledger.pgStore.js";
import { LedgerService } from "../src/modules/ledger/ledger.service.js";
import { MemoryLedgerStore, type LedgerStore } from "../src/modules/ledger/ledger.store.js";
import type { BackfillReport } from "../src/modules/ledger/ledger.types.js";
import { createDatabase } from "../server/db.js";

export interface BackfillArgs {
  file: string;
  dryRun: boolean;
}

export function parseBackfillArgs(argv: string[]): BackfillArgs {
  const dryRun = argv.includes("--dry-run");
  const positional = argv.filter((arg) => !arg.startsWith("--"));
  const unknown = argv.filter((arg) => arg.startsWith("--") && arg !== "--dry-run");
  if (unknown.length > 0) {
    throw new Error(`Unknown option(s): ${unknown.join(", ")}`);
  }
  if (positional.length !== 1) {
    throw new Error("Usage: backfillAwards <events.json> [--dry-run]");
  }
  return { file: positional[0], dryRun };
}

const eventFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ events: z.array(z.unknown()) }).transform((body) => body.events),
]);

export function parseEventFile(text: string): unknown[] {
  return eventFileSchema.parse(JSON.parse(text));
}

export async function runBackfill(events: unknown[], store: LedgerStore): Promise<BackfillReport> {
  const ledger = new LedgerService({ store });
  return ledger.backfill(events);
}

async function main() {
  const args = parseBackfillArgs(process.argv.slice(2));
  const events = parseEventFile(await readFile(args.file, "utf-8"));
  console.log(`[Backfill] ${events.length} event(s) read from ${args.file}${args.dryRun ? " (dry run)" : ""}`);

  if (args.dryRun) {
    const report = await runBackfill(events, new MemoryLedgerStore());
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL is required (or pass --dry-run)");
  }
  const { db, pool } = createDatabase(connectionString);
  try {
    const report = await runBackfill(events, new PgLedgerStore(db));
    console.log(JSON.stringify(report, null, 2));
  } finally {
    await pool.end();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main()
    .then(() => process.exit(0))
    .catch((error) => {
      console.error("[Backfill] Failed:", error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
