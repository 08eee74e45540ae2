import cors from "cors";
import express, { type Express } from "express";
import type { Logger } from "pino";
import type { AccountService } from "./account-service.ts";
import { createRouter, type ErrorBody } from "./routes.ts";
import type { StampService } from "./stamp-service.ts";

export const API_NAME = "Bee Stamp Gateway";
export const API_VERSION = "0.1.0";

export interface AppDependencies {
  stampService: StampService;
  accountService: AccountService;
  logger: Logger;
}

export function createApp({
  stampService,
  accountService,
  logger,
}: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.disable("x-powered-by");

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: Date.now() - start,
        },
        "request completed",
      );
    });
    next();
  });

  app.use("/api/v1", createRouter(stampService, accountService, logger));

  // Liveness; never touches the Bee node
  app.get("/", (req, res) => {
    res.json({
      name: API_NAME,
      version: API_VERSION,
      status: "ok",
      endpoints: {
        stamps: "/api/v1/stamps",
        stamp: "/api/v1/stamps/{batch_id}",
        wallet: "/api/v1/wallet",
        chequebook: "/api/v1/chequebook/address",
      },
    });
  });

  app.use((req, res) => {
    const body: ErrorBody = { detail: "Not Found" };
    res.status(404).json(body);
  });

  // Error handler
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction,
    ) => {
      logger.error({ err, path: req.path }, "Unhandled error");
      if (res.headersSent) {
        next(err);
        return;
      }
      const body: ErrorBody = { detail: "Internal server error" };
      res.status(500).json(body);
    },
  );

  return app;
}
