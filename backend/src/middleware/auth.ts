// src/middleware/auth.ts
import type { Request, RequestHandler } from "express";
import type { TokenService } from "../auth/tokens";
import { AuthError } from "../errors";
import { logger } from "../logger";
import type { AuthContext, IdentityClaims, Role } from "../types/claims";

export interface BypassRule {
  path: string;
  method: string;
}

/** Exact path + method pairs that never need a token. Not patterns. */
export const DEFAULT_BYPASS: readonly BypassRule[] = [
  { path: "/health", method: "GET" },
  { path: "/metrics", method: "GET" },
  { path: "/api/v1/auth/login", method: "POST" },
  { path: "/api/v1/auth/register", method: "POST" },
  { path: "/api/v1/auth/refresh", method: "POST" }
];

/**
 * Where the role of an authenticated caller comes from. There is no role
 * storage yet, so the default hands out "user" to everyone; wire a real
 * lookup here to make requireAdmin reachable.
 */
export type RoleResolver = (claims: IdentityClaims) => Role | Promise<Role>;

export const defaultRoleResolver: RoleResolver = () => "user";

export interface AuthenticateOptions {
  tokens: TokenService;
  bypass?: readonly BypassRule[];
  resolveRole?: RoleResolver;
}

export function shouldSkipAuth(path: string, method: string, bypass: readonly BypassRule[] = DEFAULT_BYPASS): boolean {
  if (method === "OPTIONS") return true; // CORS preflight
  return bypass.some((rule) => rule.path === path && rule.method === method);
}

/** Pull the token out of "Authorization: Bearer <token>". */
export function extractBearer(header: string | undefined): string {
  if (!header) throw new AuthError("authorization header is required");
  if (!header.startsWith("Bearer ")) throw new AuthError("authorization header must start with 'Bearer '");
  const token = header.slice("Bearer ".length);
  if (!token) throw new AuthError("token is empty");
  return token;
}

/**
 * Gate for every request: allow-listed routes pass untouched, everything
 * else needs a valid access token and leaves with req.auth populated.
 * Rejections share one 401 message whatever the cause.
 */
export function authenticate(opts: AuthenticateOptions): RequestHandler {
  const bypass = opts.bypass ?? DEFAULT_BYPASS;
  const resolveRole = opts.resolveRole ?? defaultRoleResolver;

  return async (req, _res, next) => {
    if (shouldSkipAuth(req.path, req.method, bypass)) return next();

    let claims: IdentityClaims;
    try {
      const token = extractBearer(req.headers.authorization);
      claims = await opts.tokens.validate(token, "access");
    } catch (e) {
      logger.warn({ reason: reasonOf(e), path: req.path, method: req.method }, "authentication failed");
      return next(new AuthError());
    }

    try {
      const ctx: AuthContext = Object.freeze({
        userId: claims.sub,
        email: claims.email,
        role: await resolveRole(claims)
      });
      req.auth = ctx;
      logger.debug({ user_id: ctx.userId, email: ctx.email }, "user authenticated");
      next();
    } catch (e) {
      next(e);
    }
  };
}

/** Identity of the caller; only valid behind authenticate(). */
export function currentUser(req: Request): AuthContext {
  if (!req.auth) throw new AuthError("User ID not found in context");
  return req.auth;
}

function reasonOf(e: unknown): string {
  if (!(e instanceof Error)) return String(e);
  return e.cause instanceof Error ? `${e.message}: ${e.cause.message}` : e.message;
}
