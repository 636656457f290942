import { Router, type RequestHandler } from "express";
import { rateLimiter } from "../../../server/middleware/rateLimit.js";
import { createLedgerController } from "./ledger.controller.js";
import type { LedgerService } from "./ledger.service.js";

export function createLedgerRouter(ledger: LedgerService, requireAdmin: RequestHandler): Router {
  const router = Router();
  const controller = createLedgerController(ledger);

  // Admin
  router.post("/events", requireAdmin, controller.appendEvent);
  router.post("/backfill", requireAdmin, controller.backfill);
  router.post("/recompute", requireAdmin, controller.recompute);
  router.put("/hunters/:hunterId/wallet", requireAdmin, controller.setWallet);
  router.get("/export", requireAdmin, controller.exportLedger);
  router.post("/restore", requireAdmin, controller.restore);

  // Public
  router.get("/hunters/:hunterId", rateLimiter, controller.getHunter);
  router.get("/hunters/:hunterId/awards", rateLimiter, controller.getHunterAwards);

  return router;
}
