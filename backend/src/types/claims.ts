// src/types/claims.ts

export type Role = "user" | "admin";

/** Access tokens carry an email; refresh tokens do not. */
export type TokenKind = "access" | "refresh";

/**
 * Claims of a verified token, rebuilt on every validation.
 * Registered claim names follow RFC 7519.
 */
export interface IdentityClaims {
  readonly sub: string;      // user id
  readonly email?: string;
  readonly iss: string;
  readonly iat: number;      // seconds
  readonly nbf: number;      // always == iat
  readonly exp: number;      // iat + ttl for the kind
  readonly kind: TokenKind;
}

/**
 * Identity attached to req.auth once the bearer token checks out.
 * (See src/middleware/auth.ts)
 */
export interface AuthContext {
  readonly userId: string;
  readonly email?: string;
  readonly role: Role;
}

declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}
