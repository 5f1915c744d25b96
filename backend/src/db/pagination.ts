// src/db/pagination.ts
import { Uuid } from "../types/dto";

// Cursor format: base64url("created_at ISO|uuid")
export function encodeCursor(createdAt: Date | string, id: string) {
  const ts = createdAt instanceof Date ? createdAt.toISOString() : createdAt;
  return Buffer.from(`${ts}|${id}`).toString("base64url");
}

/** null for an absent or unreadable cursor; callers start from the top. */
export function decodeCursor(cursor?: string | null): { createdAt: string; id: string } | null {
  if (!cursor) return null;
  const [createdAt, id, ...rest] = Buffer.from(cursor, "base64url").toString().split("|");
  if (!createdAt || !id || rest.length > 0) return null;
  if (Number.isNaN(Date.parse(createdAt)) || !Uuid.safeParse(id).success) return null;
  return { createdAt, id };
}
