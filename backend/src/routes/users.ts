// src/routes/users.ts
import { Router } from "express";
import { requireAdmin, requireUser } from "../auth/rbac";
import { respondNotModified } from "../db/etag";
import { decodeCursor, encodeCursor } from "../db/pagination";
import { NotFoundError, PolicyViolationError } from "../errors";
import { currentUser } from "../middleware/auth";
import { ListUsersQuery, UpdateUserDto } from "../types/dto";
import { toProfile, type UserPatch, type UserRepository } from "../types/user";
import {
  ValidationErrors, validateDate, validateName, validatePagination, validatePhone, validateUuid
} from "../utils/validation";

export default function userRoutes(users: UserRepository) {
  const r = Router();

  /** Caller's own profile */
  r.get("/api/v1/users/me", async (req, res, next) => {
    try {
      const user = await users.findById(currentUser(req).userId);
      if (!user) throw new NotFoundError();
      res.json(toProfile(user));
    } catch (e) { next(e); }
  });

  /** Get one profile (self only) */
  r.get("/api/v1/users/:user_id", requireUser(), async (req, res, next) => {
    try {
      const user = await users.findById(req.params.user_id);
      if (!user) throw new NotFoundError();
      const profile = toProfile(user);
      if (respondNotModified(req, res, profile)) return;
      res.json(profile);
    } catch (e) { next(e); }
  });

  /** Update profile (self only) */
  r.patch("/api/v1/users/:user_id", requireUser(), async (req, res, next) => {
    try {
      const dto = UpdateUserDto.parse(req.body);
      const errors = new ValidationErrors().collect(validateUuid(req.params.user_id, "user_id"));
      if (dto.first_name !== undefined) errors.collect(validateName(dto.first_name, "first_name"));
      if (dto.last_name !== undefined) errors.collect(validateName(dto.last_name, "last_name"));
      if (dto.phone != null) errors.collect(validatePhone(dto.phone));
      if (dto.date_of_birth != null) errors.collect(validateDate(dto.date_of_birth, "date_of_birth"));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      const patch: UserPatch = {
        first_name: dto.first_name?.trim(),
        last_name: dto.last_name?.trim(),
        phone: dto.phone,
        date_of_birth: dto.date_of_birth
      };
      const user = await users.update(req.params.user_id, patch);
      if (!user) throw new NotFoundError();
      res.json(toProfile(user));
    } catch (e) { next(e); }
  });

  /** List users (Admin only, cursor pagination) */
  r.get("/api/v1/admin/users", requireAdmin, async (req, res, next) => {
    try {
      const query = ListUsersQuery.parse(req.query);
      const errors = new ValidationErrors().collect(validatePagination(1, query.limit));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      const rows = await users.list({ limit: query.limit + 1, cursor: decodeCursor(query.cursor) });
      const hasMore = rows.length > query.limit;
      const items = hasMore ? rows.slice(0, -1) : rows;
      const last = items[items.length - 1];
      const nextCursor = hasMore && last ? encodeCursor(last.created_at, last.id) : null;
      res.json({ items: items.map(toProfile), nextCursor });
    } catch (e) { next(e); }
  });

  return r;
}
