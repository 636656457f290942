// server/index.ts
// Hunter progression ledger HTTP server

import { loadLedgerConfig } from "../src/config/ledgerConfig.js";
import { ConfigurationError } from "../src/modules/ledger/ledger.errors.js";
import { createAppContext, publishExistingLedger, type AppContext } from "./context.js";
import { registerRoutes } from "./routes.js";

async function main(): Promise<void> {
  let ctx: AppContext;
  try {
    ctx = createAppContext(loadLedgerConfig());
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`[Server] Configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const server = registerRoutes(ctx);

  if (ctx.config.schedulerEnabled) {
    ctx.scheduler.start();
  } else {
    console.log("[Server] Publish scheduler disabled (set LEDGER_SCHEDULER_ENABLED=true to enable)");
  }

  await publishExistingLedger(ctx);

  server.listen(ctx.config.port, "0.0.0.0", () => {
    console.log(`[Server] Ledger listening on port ${ctx.config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      ctx.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("[Server] Shutdown error:", err);
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("[Server] Fatal startup error:", err);
  process.exit(1);
});
