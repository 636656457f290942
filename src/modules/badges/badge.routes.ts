import { Router, type Request, type Response } from "express";
import { rateLimiter } from "../../../server/middleware/rateLimit.js";
import type { BadgeDocumentStore } from "./badgePublisher.js";

export function createBadgeRouter(store: BadgeDocumentStore): Router {
  const router = Router();
  router.use(rateLimiter);

  router.get("/", (_req: Request, res: Response) => {
    res.json({ keys: store.keys() });
  });

  router.get("/*", (req: Request, res: Response) => {
    const key = (req.params["0"] ?? "").replace(/\.json$/, "");
    const body = store.get(key);
    if (body === undefined) {
      return res.status(404).json({
        success: false,
        error: { code: "NOT_FOUND", message: `Badge document ${key} not found` },
      });
    }
    res.setHeader("Cache-Control", "public, max-age=300");
    res.type("application/json; charset=utf-8").send(body);
  });

  return router;
}
