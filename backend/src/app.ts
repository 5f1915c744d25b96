// src/app.ts
import express from "express";
import helmet from "helmet";
import cors from "cors";
import pinoHttp from "pino-http";
import { logger } from "./logger";
import type { PasswordHasher } from "./auth/password";
import type { TokenService } from "./auth/tokens";
import { authenticate, type BypassRule, type RoleResolver } from "./middleware/auth";
import { errorHandler } from "./middleware/error";
import type { ExpenseRepository } from "./types/expense";
import type { GoalRepository } from "./types/goal";
import type { InvestmentRepository } from "./types/investment";
import type { UserRepository } from "./types/user";

// ---- Routes ----
import healthRoutes, { type HealthCheck } from "./routes/health";
import authRoutes from "./routes/auth";
import userRoutes from "./routes/users";
import expenseRoutes from "./routes/expenses";
import goalRoutes from "./routes/goals";
import investmentRoutes from "./routes/investments";

export interface AppDeps {
  tokens: TokenService;
  passwords: PasswordHasher;
  users: UserRepository;
  expenses: ExpenseRepository;
  goals: GoalRepository;
  investments: InvestmentRepository;
  /** today's date for goal overdue checks */
  clock?: () => Date;
  resolveRole?: RoleResolver;
  bypass?: readonly BypassRule[];
  healthCheck?: HealthCheck;
}

export function createApp(deps: AppDeps) {
  const app = express();

  // --- Core middleware ---
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(pinoHttp({ logger }));

  // --- Auth gate for every request (allow-listed routes pass through) ---
  app.use(authenticate({ tokens: deps.tokens, resolveRole: deps.resolveRole, bypass: deps.bypass }));

  // --- Routes ---
  app.use(healthRoutes(deps.healthCheck));  // /health
  app.use(authRoutes(deps));                // /api/v1/auth/{register,login,refresh}
  app.use(userRoutes(deps.users));          // /api/v1/users..., /api/v1/admin/users
  app.use(expenseRoutes(deps.expenses));    // /api/v1/expense-categories, /api/v1/users/:user_id/expenses
  app.use(goalRoutes({ goals: deps.goals, clock: deps.clock }));  // /api/v1/users/:user_id/goals
  app.use(investmentRoutes(deps.investments));  // /api/v1/investment-types, /api/v1/users/:user_id/investments

  // --- Global error handler (last) ---
  app.use(errorHandler);

  return app;
}
