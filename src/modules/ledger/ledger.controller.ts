import type { Request, Response } from "express";
import { z, ZodError } from "zod";
import { LedgerError } from "./ledger.errors.js";
import type { LedgerService } from "./ledger.service.js";

const STATUS_BY_CODE: Record<string, number> = {
  DUPLICATE_EVENT: 409,
  UNKNOWN_ACTION_KIND: 422,
  INVALID_EVENT: 400,
  NOT_FOUND: 404,
};

const backfillBodySchema = z.union([
  z.array(z.unknown()),
  z.object({ events: z.array(z.unknown()) }).transform((body) => body.events),
]);

const walletBodySchema = z.object({
  wallet: z.string().trim().min(1).nullable(),
});

const recomputeQuerySchema = z.object({
  hunterId: z.string().trim().min(1).optional(),
});

/**
 * Maps ledger errors onto the `{success: false, error}` envelope. Anything
 * that is not a ledger or validation error is a 500.
 */
export function sendLedgerError(res: Response, error: unknown, context: string) {
  if (error instanceof LedgerError) {
    return res.status(STATUS_BY_CODE[error.code] ?? 500).json({
      success: false,
      error: { code: error.code, message: error.message },
    });
  }
  if (error instanceof ZodError) {
    return res.status(400).json({
      success: false,
      error: {
        code: "INVALID_EVENT",
        message: error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "),
      },
    });
  }
  console.error(`[Ledger] ${context} error:`, error);
  return res.status(500).json({
    success: false,
    error: { code: "INTERNAL_ERROR", message: error instanceof Error ? error.message : String(error) },
  });
}

function notFound(res: Response, message: string) {
  return res.status(404).json({
    success: false,
    error: { code: "NOT_FOUND", message },
  });
}

export function createLedgerController(ledger: LedgerService) {
  return {
    async appendEvent(req: Request, res: Response) {
      try {
        const result = await ledger.append(req.body);
        res.status(201).json({ success: true, ...result });
      } catch (error) {
        sendLedgerError(res, error, "appendEvent");
      }
    },

    async backfill(req: Request, res: Response) {
      try {
        const events = backfillBodySchema.parse(req.body);
        const report = await ledger.backfill(events);
        res.json({ success: true, report });
      } catch (error) {
        sendLedgerError(res, error, "backfill");
      }
    },

    async recompute(req: Request, res: Response) {
      try {
        const { hunterId } = recomputeQuerySchema.parse(req.query);
        if (hunterId && !(await ledger.getHunter(hunterId))) {
          return notFound(res, `Hunter ${hunterId} not found`);
        }
        const report = hunterId ? await ledger.recomputeHunter(hunterId) : await ledger.recomputeAll();
        res.json({ success: true, report });
      } catch (error) {
        sendLedgerError(res, error, "recompute");
      }
    },

    async setWallet(req: Request, res: Response) {
      try {
        const { wallet } = walletBodySchema.parse(req.body);
        const hunter = await ledger.registerHunter(req.params.hunterId, wallet);
        res.json({ success: true, hunter });
      } catch (error) {
        sendLedgerError(res, error, "setWallet");
      }
    },

    async getHunter(req: Request, res: Response) {
      try {
        const hunter = await ledger.getHunter(req.params.hunterId);
        if (!hunter) {
          return notFound(res, `Hunter ${req.params.hunterId} not found`);
        }
        res.json({ hunter });
      } catch (error) {
        sendLedgerError(res, error, "getHunter");
      }
    },

    async getHunterAwards(req: Request, res: Response) {
      try {
        const hunter = await ledger.getHunter(req.params.hunterId);
        if (!hunter) {
          return notFound(res, `Hunter ${req.params.hunterId} not found`);
        }
        const awards = await ledger.listAwards(hunter.hunterId);
        res.json({ hunterId: hunter.hunterId, awards });
      } catch (error) {
        sendLedgerError(res, error, "getHunterAwards");
      }
    },

    async exportLedger(_req: Request, res: Response) {
      try {
        res.json(await ledger.exportLedger());
      } catch (error) {
        sendLedgerError(res, error, "exportLedger");
      }
    },

    async restore(req: Request, res: Response) {
      try {
        const report = await ledger.restore(req.body);
        res.json({ success: true, report });
      } catch (error) {
        sendLedgerError(res, error, "restore");
      }
    },
  };
}

export type LedgerController = ReturnType<typeof createLedgerController>;
