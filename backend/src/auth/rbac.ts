// src/auth/rbac.ts
import type { RequestHandler } from "express";
import { AuthError, ForbiddenError } from "../errors";
import { logger } from "../logger";
import type { Role } from "../types/claims";

export function requireRole(required: Role): RequestHandler {
  return (req, _res, next) => {
    const role = req.auth?.role;
    if (!role) return next(new AuthError("User role not found in context"));
    if (role !== required) {
      logger.warn({ user_role: role, required_role: required }, "user does not have required role");
      return next(new ForbiddenError("Insufficient permissions"));
    }
    next();
  };
}

// Admin-only guard
export const requireAdmin: RequestHandler = requireRole("admin");

export interface OwnershipOptions {
  /**
   * A path without a "users/<id>" pair passes by default. Set this to
   * refuse such requests instead.
   */
  enforceOwnership?: boolean;
}

// Segment after "users"; express matches paths case-insensitively, so this does too
function userSegment(path: string): string | undefined {
  const parts = path.split("/");
  const at = parts.findIndex((p) => p.toLowerCase() === "users");
  return at === -1 || at + 1 >= parts.length ? undefined : parts[at + 1];
}

/**
 * Self-access: the :user_id route parameter, or failing that the segment
 * after "users", must be the caller's own id.
 */
export function requireUser(opts: OwnershipOptions = {}): RequestHandler {
  return (req, _res, next) => {
    const userId = req.auth?.userId;
    if (!userId) return next(new AuthError("User ID not found in context"));

    const fromRoute: string | undefined = req.params.user_id;
    const requested = fromRoute ?? userSegment(req.baseUrl + req.path);
    if (requested === undefined) {
      if (opts.enforceOwnership) return next(new ForbiddenError("Cannot access another user's resources"));
      return next(); // route not user-scoped
    }

    if (requested !== userId) {
      logger.warn({ authenticated_user_id: userId, requested_user_id: requested }, "user tried to access another user's resource");
      return next(new ForbiddenError("Cannot access another user's resources"));
    }
    next();
  };
}
