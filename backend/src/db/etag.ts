// src/db/etag.ts
import crypto from "crypto";
import type { Request, Response } from "express";

/** Weak validator over the serialized representation. */
export function weakEtag(representation: unknown): string {
  const digest = crypto.createHash("sha256").update(JSON.stringify(representation)).digest("base64url");
  return `W/"${digest}"`;
}

// If-None-Match may be "*" or a comma-separated list
function matches(header: string | undefined, etag: string): boolean {
  if (!header) return false;
  return header.split(",").some((candidate) => {
    const tag = candidate.trim();
    return tag === "*" || tag === etag;
  });
}

/**
 * Tags the response and, when the client already holds this version,
 * finishes it with 304. Returns true if the response has been sent.
 */
export function respondNotModified(req: Request, res: Response, representation: unknown): boolean {
  const etag = weakEtag(representation);
  res.setHeader("ETag", etag);
  if (!matches(req.headers["if-none-match"], etag)) return false;
  res.status(304).end();
  return true;
}
