import type { Request, Response, NextFunction, RequestHandler } from "express";

function providedKey(req: Request): string | null {
  const header = req.headers["x-ledger-api-key"];
  if (typeof header === "string" && header) return header;
  const authorization = req.headers["authorization"];
  return authorization?.startsWith("Bearer ") ? authorization.substring(7) : null;
}

/**
 * Guards the write side of the ledger. Without a configured key every admin
 * route answers 500 rather than running unauthenticated.
 */
export function requireAdminApiKey(expectedKey: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedKey) {
      console.error("[LedgerAuth] LEDGER_ADMIN_API_KEY not configured");
      res.status(500).json({
        success: false,
        error: { code: "CONFIGURATION_ERROR", message: "Server configuration error" },
      });
      return;
    }

    const key = providedKey(req);

    if (!key) {
      res.status(401).json({
        success: false,
        error: {
          code: "UNAUTHORIZED",
          message: "Admin API key required. Provide x-ledger-api-key header or Authorization: Bearer <key>",
        },
      });
      return;
    }

    if (key !== expectedKey) {
      res.status(403).json({
        success: false,
        error: { code: "FORBIDDEN", message: "Invalid admin API key" },
      });
      return;
    }

    next();
  };
}
