// src/config/ledgerConfig.ts
// Runtime configuration read from the environment

import { z } from "zod";
import { ConfigurationError } from "../modules/ledger/ledger.errors.js";

export interface PublishRetryConfig {
  retries: number;
  minTimeoutMs: number;
  maxTimeoutMs: number;
}

export interface LedgerConfig {
  port: number;
  databaseUrl: string | null;
  adminApiKey: string | null;
  badgeOutputDir: string | null;
  publishRetry: PublishRetryConfig;
  publishCron: string;
  schedulerEnabled: boolean;
}

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  port: 5000,
  databaseUrl: null,
  adminApiKey: null,
  badgeOutputDir: null,
  publishRetry: {
    retries: 5,
    minTimeoutMs: 1000,
    maxTimeoutMs: 30_000,
  },
  publishCron: "*/5 * * * *", // every 5 minutes
  schedulerEnabled: false,
};

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : null));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().optional(),
  DATABASE_URL: optionalString,
  LEDGER_ADMIN_API_KEY: optionalString,
  BADGE_OUTPUT_DIR: optionalString,
  PUBLISH_RETRIES: z.coerce.number().int().min(0).optional(),
  PUBLISH_MIN_TIMEOUT_MS: z.coerce.number().int().min(0).optional(),
  PUBLISH_MAX_TIMEOUT_MS: z.coerce.number().int().min(0).optional(),
  PUBLISH_CRON: optionalString,
  LEDGER_SCHEDULER_ENABLED: optionalString,
});

export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  const defaults = DEFAULT_LEDGER_CONFIG;

  return {
    port: e.PORT ?? defaults.port,
    databaseUrl: e.DATABASE_URL,
    adminApiKey: e.LEDGER_ADMIN_API_KEY,
    badgeOutputDir: e.BADGE_OUTPUT_DIR,
    publishRetry: {
      retries: e.PUBLISH_RETRIES ?? defaults.publishRetry.retries,
      minTimeoutMs: e.PUBLISH_MIN_TIMEOUT_MS ?? defaults.publishRetry.minTimeoutMs,
      maxTimeoutMs: e.PUBLISH_MAX_TIMEOUT_MS ?? defaults.publishRetry.maxTimeoutMs,
    },
    publishCron: e.PUBLISH_CRON ?? defaults.publishCron,
    schedulerEnabled: e.LEDGER_SCHEDULER_ENABLED === "true",
  };
}
