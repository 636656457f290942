import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { rateLimiter } from "../../../server/middleware/rateLimit.js";
import { sendLedgerError } from "../ledger/ledger.controller.js";
import type { LeaderboardService } from "./leaderboard.renderer.js";

const limitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export function createLeaderboardRouter(leaderboard: LeaderboardService): Router {
  const router = Router();
  router.use(rateLimiter);

  router.get("/leaderboard", async (req: Request, res: Response) => {
    try {
      const { limit } = limitQuerySchema.parse(req.query);
      const entries = await leaderboard.getEntries({ limit });
      res.json({ count: entries.length, entries });
    } catch (error) {
      sendLedgerError(res, error, "leaderboard");
    }
  });

  router.get("/leaderboard/summary", async (_req: Request, res: Response) => {
    try {
      res.json(await leaderboard.getSummary());
    } catch (error) {
      sendLedgerError(res, error, "leaderboard summary");
    }
  });

  router.get("/leaderboard.md", async (_req: Request, res: Response) => {
    try {
      const markdown = await leaderboard.getMarkdown(new Date());
      res.type("text/markdown; charset=utf-8").send(markdown);
    } catch (error) {
      sendLedgerError(res, error, "leaderboard markdown");
    }
  });

  return router;
}
