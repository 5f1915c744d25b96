// src/logger.ts
import pino from "pino";

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info");

export const logger = pino({
  level,
  base: { service: "finance-tracker-api" },
  // bearer tokens and cookies never reach the log sink
  redact: ["req.headers.authorization", "req.headers.cookie"]
});
