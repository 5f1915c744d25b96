// src/db/users.ts
import { q } from "./index";
import { SQL } from "./sql";
import { ConflictError } from "../errors";
import type { NewUser, User, UserPage, UserPatch, UserRepository } from "../types/user";

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === UNIQUE_VIOLATION;
}

export class PgUserRepository implements UserRepository {
  async create(input: NewUser): Promise<User> {
    try {
      const { rows } = await q<User>(SQL.insertUser, [
        input.email, input.password_hash, input.first_name, input.last_name,
        input.phone, input.date_of_birth
      ]);
      return rows[0];
    } catch (e) {
      if (isUniqueViolation(e)) throw new ConflictError("email already registered");
      throw e;
    }
  }

  async findById(id: string): Promise<User | undefined> {
    const { rows } = await q<User>(SQL.userById, [id]);
    return rows[0];
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const { rows } = await q<User>(SQL.userByEmail, [email]);
    return rows[0];
  }

  async update(id: string, patch: UserPatch): Promise<User | undefined> {
    const { rows } = await q<User>(SQL.updateUser, [
      id,
      patch.first_name ?? null,
      patch.last_name ?? null,
      patch.phone !== undefined, patch.phone ?? null,
      patch.date_of_birth !== undefined, patch.date_of_birth ?? null
    ]);
    return rows[0];
  }

  async touchLastLogin(id: string): Promise<void> {
    await q(SQL.touchLastLogin, [id]);
  }

  async list({ limit, cursor }: UserPage): Promise<User[]> {
    const { rows } = cursor
      ? await q<User>(SQL.listUsersAfter, [limit, cursor.createdAt, cursor.id])
      : await q<User>(SQL.listUsers, [limit]);
    return rows;
  }
}
