import "dotenv/config";
import { existsSync, readFileSync } from "node:fs";
import { createServer as createHttpServer } from "node:http";
import { createServer as createHttpsServer } from "node:https";
import { AccountService } from "./account-service.ts";
import { createApp } from "./app.ts";
import { BeeClient } from "./bee-client.ts";
import { type ApiConfig, loadConfig, upstreamTimeoutMs } from "./config.ts";
import { logger } from "./logger.ts";
import { StampService } from "./stamp-service.ts";

function createServer(config: ApiConfig, app: ReturnType<typeof createApp>) {
  const { SSL_KEYFILE: keyFile, SSL_CERTFILE: certFile } = config;
  if (keyFile && certFile && existsSync(keyFile) && existsSync(certFile)) {
    logger.info({ keyFile, certFile }, "TLS enabled");
    return createHttpsServer(
      { key: readFileSync(keyFile), cert: readFileSync(certFile) },
      app,
    );
  }
  if (keyFile || certFile) {
    logger.warn(
      { keyFile, certFile },
      "SSL key/cert file specified but not found - serving plain HTTP",
    );
  }
  return createHttpServer(app);
}

async function main() {
  const config = loadConfig();
  logger.level = config.LOG_LEVEL;
  logger.info({ config }, "Stamp API starting");

  const client = new BeeClient({
    baseUrl: config.SWARM_BEE_API_URL,
    timeoutMs: upstreamTimeoutMs(config),
    logger,
  });
  const app = createApp({
    stampService: new StampService({ client, logger }),
    accountService: new AccountService({ client, logger }),
    logger,
  });

  const server = createServer(config, app);
  server.listen(config.PORT, config.HOST, () => {
    logger.info(
      { host: config.HOST, port: config.PORT, beeUrl: config.SWARM_BEE_API_URL },
      "Stamp API listening",
    );
  });

  // Graceful shutdown
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  logger.fatal({ err: error }, "Fatal API error");
  process.exit(1);
});
