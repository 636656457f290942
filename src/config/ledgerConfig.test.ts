import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../modules/ledger/ledger.errors.js";
import { DEFAULT_LEDGER_CONFIG, loadLedgerConfig } from "./ledgerConfig.js";

describe("loadLedgerConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadLedgerConfig({})).toEqual(DEFAULT_LEDGER_CONFIG);
  });

  it("reads overrides and treats blank strings as unset", () => {
    const config = loadLedgerConfig({
      PORT: "8080",
      DATABASE_URL: "  ",
      LEDGER_ADMIN_API_KEY: "test-secret",
      BADGE_OUTPUT_DIR: "./badges",
      PUBLISH_RETRIES: "2",
      PUBLISH_CRON: "0 * * * *",
      LEDGER_SCHEDULER_ENABLED: "true",
    });
    expect(config.port).toBe(8080);
    expect(config.databaseUrl).toBeNull();
    expect(config.adminApiKey).toBe("test-secret");
    expect(config.badgeOutputDir).toBe("./badges");
    expect(config.publishRetry).toEqual({ retries: 2, minTimeoutMs: 1000, maxTimeoutMs: 30_000 });
    expect(config.publishCron).toBe("0 * * * *");
    expect(config.schedulerEnabled).toBe(true);
  });

  it("rejects malformed numbers", () => {
    expect(() => loadLedgerConfig({ PUBLISH_RETRIES: "-1" })).toThrow(ConfigurationError);
    expect(() => loadLedgerConfig({ PORT: "http" })).toThrow(/PORT/);
  });
});
