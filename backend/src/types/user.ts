// src/types/user.ts

/** Row shape of the users table. */
export interface User {
  id: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  phone: string | null;
  date_of_birth: string | null; // YYYY-MM-DD
  created_at: Date;
  updated_at: Date;
  is_active: boolean;
  last_login: Date | null;
}

export type NewUser = Pick<User, "email" | "password_hash" | "first_name" | "last_name" | "phone" | "date_of_birth">;

export type UserPatch = Partial<Pick<User, "first_name" | "last_name" | "phone" | "date_of_birth">>;

/** What clients get to see; never the hash. */
export type UserProfile = Pick<
  User,
  "id" | "email" | "first_name" | "last_name" | "phone" | "date_of_birth" | "created_at" | "last_login"
>;

export function toProfile(u: User): UserProfile {
  return {
    id: u.id,
    email: u.email,
    first_name: u.first_name,
    last_name: u.last_name,
    phone: u.phone,
    date_of_birth: u.date_of_birth,
    created_at: u.created_at,
    last_login: u.last_login
  };
}

export interface UserPage {
  limit: number;
  cursor: { createdAt: string; id: string } | null;
}

export interface UserRepository {
  /** Rejects with ConflictError when the email is taken. */
  create(input: NewUser): Promise<User>;
  findById(id: string): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  update(id: string, patch: UserPatch): Promise<User | undefined>;
  touchLastLogin(id: string): Promise<void>;
  /** Newest first, keyset on (created_at, id); returns at most limit rows. */
  list(page: UserPage): Promise<User[]>;
}
