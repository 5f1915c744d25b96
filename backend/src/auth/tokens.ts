// src/auth/tokens.ts
import { SignJWT, jwtVerify, type JWTPayload } from "jose";
import { AuthError, ConfigurationError } from "../errors";
import type { IdentityClaims, TokenKind } from "../types/claims";

export const ACCESS_TOKEN_TTL_SEC = 24 * 60 * 60;
export const REFRESH_TOKEN_TTL_SEC = 7 * ACCESS_TOKEN_TTL_SEC;

/** Only symmetric HMAC signatures are accepted; anything else is algorithm confusion. */
export const HMAC_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;
export type HmacAlgorithm = (typeof HMAC_ALGORITHMS)[number];

export interface TokenServiceOptions {
  secret: string;
  issuer: string;
  algorithm?: HmacAlgorithm;
  /**
   * When set, validate() rejects a token whose kind differs from the one
   * the caller expects. Off by default: refresh tokens then pass as access tokens.
   */
  enforceKind?: boolean;
  clock?: () => Date;
}

const TTL: Record<TokenKind, number> = {
  access: ACCESS_TOKEN_TTL_SEC,
  refresh: REFRESH_TOKEN_TTL_SEC
};

/**
 * Issues and verifies stateless identity tokens.
 * Holds nothing mutable, so one instance serves every request.
 */
export class TokenService {
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly algorithm: HmacAlgorithm;
  private readonly enforceKind: boolean;
  private readonly clock: () => Date;

  constructor(opts: TokenServiceOptions) {
    if (!opts.secret) throw new ConfigurationError("token signing secret is required");
    if (!opts.issuer) throw new ConfigurationError("token issuer is required");
    this.key = new TextEncoder().encode(opts.secret);
    this.issuer = opts.issuer;
    this.algorithm = opts.algorithm ?? "HS256";
    this.enforceKind = opts.enforceKind ?? false;
    this.clock = opts.clock ?? (() => new Date());
  }

  issueAccessToken(subject: string, email: string): Promise<string> {
    return this.sign(subject, "access", { email });
  }

  issueRefreshToken(subject: string): Promise<string> {
    return this.sign(subject, "refresh", {});
  }

  /**
   * Verify algorithm, signature, issuer and time window.
   * Every failure becomes the same AuthError; the cause is kept for logs only.
   */
  async validate(token: string, expected: TokenKind = "access"): Promise<IdentityClaims> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, this.key, {
        algorithms: [...HMAC_ALGORITHMS],
        issuer: this.issuer,
        currentDate: this.clock(),
        requiredClaims: ["sub", "iat", "nbf", "exp"]
      }));
    } catch (err) {
      throw new AuthError(undefined, { cause: err });
    }

    const claims = toClaims(payload);
    if (!claims) throw new AuthError();
    if (this.enforceKind && claims.kind !== expected) throw new AuthError();
    return claims;
  }

  async extractSubjectId(token: string): Promise<string> {
    const { sub } = await this.validate(token);
    return sub;
  }

  private sign(subject: string, kind: TokenKind, extra: { email?: string }): Promise<string> {
    const iat = Math.floor(this.clock().getTime() / 1000);
    return new SignJWT({ ...extra, kind })
      .setProtectedHeader({ alg: this.algorithm, typ: "JWT" })
      .setIssuer(this.issuer)
      .setSubject(String(subject))
      .setIssuedAt(iat)
      .setNotBefore(iat)
      .setExpirationTime(iat + TTL[kind])
      .sign(this.key);
  }
}

function toClaims(payload: JWTPayload): IdentityClaims | undefined {
  const { sub, iss, iat, nbf, exp } = payload;
  if (typeof sub !== "string" || sub === "") return undefined;
  if (typeof iss !== "string" || typeof iat !== "number") return undefined;
  if (typeof nbf !== "number" || typeof exp !== "number") return undefined;

  const email = typeof payload.email === "string" ? payload.email : undefined;
  const kind: TokenKind = payload.kind === "refresh" ? "refresh" : "access";
  return Object.freeze({ sub, email, iss, iat, nbf, exp, kind });
}
