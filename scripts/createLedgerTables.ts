import { sql } from "drizzle-orm";
import { createDatabase } from "../server/db.js";

async function createLedgerTables() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL is required");
  }

  const { db, pool } = createDatabase(connectionString);
  console.log("Creating ledger tables...");

  try {
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS awards (
        id SERIAL PRIMARY KEY,
        idempotency_key TEXT NOT NULL,
        hunter_id TEXT NOT NULL,
        action_kind TEXT NOT NULL,
        reference_amount DOUBLE PRECISION,
        tier TEXT,
        xp INTEGER NOT NULL,
        source_ref TEXT NOT NULL,
        description TEXT NOT NULL,
        degraded BOOLEAN NOT NULL DEFAULT FALSE,
        occurred_at TIMESTAMPTZ NOT NULL,
        recorded_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE UNIQUE INDEX IF NOT EXISTS awards_idempotency_key_idx ON awards (idempotency_key);
      CREATE INDEX IF NOT EXISTS awards_hunter_id_idx ON awards (hunter_id);
      CREATE INDEX IF NOT EXISTS awards_occurred_at_idx ON awards (occurred_at);

      CREATE TABLE IF NOT EXISTS hunters (
        hunter_id TEXT PRIMARY KEY,
        wallet TEXT,
        xp INTEGER NOT NULL DEFAULT 0,
        level INTEGER NOT NULL DEFAULT 1,
        title TEXT NOT NULL,
        badges JSON NOT NULL,
        action_counts JSON NOT NULL,
        award_count INTEGER NOT NULL DEFAULT 0,
        last_action JSON,
        first_award_at TIMESTAMPTZ,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS hunters_xp_idx ON hunters (xp);
    `);

    console.log("Ledger tables created successfully!");
  } catch (error) {
    console.error("Error creating tables:", error);
    throw error;
  } finally {
    await pool.end();
  }
}

createLedgerTables()
  .then(() => {
    console.log("Done!");
    process.exit(0);
  })
  .catch((error) => {
    console.error("Failed:", error);
    process.exit(1);
  });
