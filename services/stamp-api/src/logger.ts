import pino from "pino";

export const logger = pino({
  name: "stamp-api",
  level: process.env.LOG_LEVEL ?? "info",
});
