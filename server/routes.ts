import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server } from "http";
import { createBadgeRouter } from "../src/modules/badges/badge.routes.js";
import { createLeaderboardRouter } from "../src/modules/leaderboards/leaderboard.routes.js";
import { sendLedgerError } from "../src/modules/ledger/ledger.controller.js";
import { createLedgerRouter } from "../src/modules/ledger/ledger.routes.js";
import type { AppContext } from "./context.js";
import { requireAdminApiKey } from "./middleware/ledgerAuth.js";

export function createApp(ctx: AppContext): Express {
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      ledgerVersion: ctx.ledger.currentVersion,
      publisher: ctx.scheduler.getStatus(),
      pendingPublishes: ctx.queue.pendingHunters().length,
    });
  });

  app.use("/api/ledger", createLedgerRouter(ctx.ledger, requireAdminApiKey(ctx.config.adminApiKey)));
  app.use("/api", createLeaderboardRouter(ctx.leaderboard));
  app.use("/badges", createBadgeRouter(ctx.documents));

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: { code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` },
    });
  });

  // Malformed JSON bodies land here from express.json()
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof SyntaxError) {
      return res.status(400).json({
        success: false,
        error: { code: "INVALID_EVENT", message: `Malformed JSON body: ${err.message}` },
      });
    }
    sendLedgerError(res, err, "request");
  });

  return app;
}

export function registerRoutes(ctx: AppContext): Server {
  return createServer(createApp(ctx));
}
