// src/server.ts
import { cfg } from "./config";
import { createApp } from "./app";
import { logger } from "./logger";
import { PasswordHasher } from "./auth/password";
import { TokenService } from "./auth/tokens";
import { healthCheck, pool } from "./db";
import { PgUserRepository } from "./db/users";
import { PgExpenseRepository } from "./db/expenses";
import { PgGoalRepository } from "./db/goals";
import { PgInvestmentRepository } from "./db/investments";

async function main() {
  if (cfg.auth.secretSource === "development-default") {
    logger.warn({ env: cfg.env }, "JWT_SECRET not set; using the development signing key");
  }

  await healthCheck();
  logger.info("connected to PostgreSQL");

  const app = createApp({
    tokens: new TokenService({
      secret: cfg.auth.jwtSecret,
      issuer: cfg.auth.issuer,
      enforceKind: cfg.auth.enforceTokenKind
    }),
    passwords: new PasswordHasher(cfg.auth.bcryptCost),
    users: new PgUserRepository(),
    expenses: new PgExpenseRepository(),
    goals: new PgGoalRepository(),
    investments: new PgInvestmentRepository(),
    healthCheck
  });

  const server = app.listen(cfg.port, cfg.host, () => logger.info({ port: cfg.port, host: cfg.host }, "API up"));

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, "failed to close database pool");
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "startup failed");
  process.exit(1);
});
