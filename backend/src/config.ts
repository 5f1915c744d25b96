// src/config.ts
import { ConfigurationError } from "./errors";
import { DEFAULT_BCRYPT_COST } from "./auth/password";

export type NodeEnv = "development" | "test" | "production";

export interface AppConfig {
  env: NodeEnv;
  port: number;
  host: string;
  pg: {
    connectionString: string;
    ssl: false | { rejectUnauthorized: boolean };
    maxConnections: number;
    idleTimeoutMs: number;
  };
  auth: {
    jwtSecret: string;
    /** "development-default" means JWT_SECRET was absent and a dev key is in use */
    secretSource: "env" | "development-default";
    issuer: string;
    bcryptCost: number;
    enforceTokenKind: boolean;
  };
}

// only ever used when NODE_ENV is development or test
const DEV_JWT_SECRET = "dev-only-jwt-secret-do-not-deploy";

function intEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? fallback : n;
}

function boolEnv(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function nodeEnv(value: string | undefined): NodeEnv {
  return value === "production" || value === "test" ? value : "development";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const mode = nodeEnv(env.NODE_ENV);

  let jwtSecret = env.JWT_SECRET ?? "";
  let secretSource: AppConfig["auth"]["secretSource"] = "env";
  if (!jwtSecret) {
    if (mode === "production") {
      throw new ConfigurationError("JWT_SECRET must be set outside development and test");
    }
    jwtSecret = DEV_JWT_SECRET;
    secretSource = "development-default";
  }

  const bcryptCost = intEnv(env.BCRYPT_COST, DEFAULT_BCRYPT_COST);
  if (bcryptCost < 4 || bcryptCost > 31) {
    throw new ConfigurationError(`BCRYPT_COST must be in 4..31, got ${bcryptCost}`);
  }

  return {
    env: mode,
    port: intEnv(env.PORT, 8001),
    host: env.HOST ?? "0.0.0.0",
    // DB may live on a different server
    pg: {
      connectionString: env.DATABASE_URL ?? "postgres://postgres@localhost:5432/finance",
      ssl: env.PGSSL === "true" ? { rejectUnauthorized: false } : false,
      maxConnections: intEnv(env.DB_MAX_OPEN_CONNS, 25),
      idleTimeoutMs: intEnv(env.DB_IDLE_TIMEOUT_MS, 5 * 60 * 1000)
    },
    auth: {
      jwtSecret,
      secretSource,
      issuer: env.JWT_ISSUER ?? "finance-tracker",
      bcryptCost,
      enforceTokenKind: boolEnv(env.TOKEN_ENFORCE_KIND, false)
    }
  };
}

export const cfg = loadConfig();
