import {
  isGatewayError,
  serializeStampRecord,
  UpstreamAbortedError,
} from "@stamp-gateway/stamp-primitives";
import { type Response, Router } from "express";
import type { Logger } from "pino";
import type { AccountService } from "./account-service.ts";
import type { StampService } from "./stamp-service.ts";

export interface ErrorBody {
  detail: string;
}

/**
 * Signal that fires if the client hangs up before we answer.
 */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function sendError(
  res: Response,
  error: unknown,
  logger: Logger,
): void {
  if (error instanceof UpstreamAbortedError || res.headersSent) {
    // Client is gone; there is nobody to answer.
    return;
  }
  if (isGatewayError(error)) {
    const body: ErrorBody = { detail: error.message };
    res.status(error.status).json(body);
    return;
  }
  logger.error({ err: error }, "Unhandled error in route");
  const body: ErrorBody = { detail: "Internal server error" };
  res.status(500).json(body);
}

export function createRouter(
  stampService: StampService,
  accountService: AccountService,
  logger: Logger,
): Router {
  const router = Router();

  /**
   * GET /api/v1/stamps
   * Every stamp batch on the node, with derived expiration
   */
  router.get("/stamps", async (req, res) => {
    try {
      const records = await stampService.listStamps({
        signal: abortOnDisconnect(res),
      });
      res.json(records.map(serializeStampRecord));
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  /**
   * GET /api/v1/stamps/:batchId
   * One stamp batch by ID
   */
  router.get("/stamps/:batchId", async (req, res) => {
    try {
      const record = await stampService.getStamp(req.params.batchId, {
        signal: abortOnDisconnect(res),
      });
      res.json(serializeStampRecord(record));
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  /**
   * GET /api/v1/wallet
   * Node wallet address and BZZ balance
   */
  router.get("/wallet", async (req, res) => {
    try {
      const wallet = await accountService.getWallet({
        signal: abortOnDisconnect(res),
      });
      res.json(wallet);
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  /**
   * GET /api/v1/chequebook/address
   * Chequebook address with available and total balance
   */
  router.get("/chequebook/address", async (req, res) => {
    try {
      const chequebook = await accountService.getChequebook({
        signal: abortOnDisconnect(res),
      });
      res.json(chequebook);
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  return router;
}
