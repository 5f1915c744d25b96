import bcrypt from "bcrypt";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../src/app";
import { PasswordHasher } from "../src/auth/password";
import { ACCESS_TOKEN_TTL_SEC, TokenService } from "../src/auth/tokens";
import { encodeCursor } from "../src/db/pagination";
import type { RoleResolver } from "../src/middleware/auth";
import { InMemoryExpenseRepository } from "./support/memory-expenses";
import { InMemoryGoalRepository } from "./support/memory-goals";
import { InMemoryInvestmentRepository } from "./support/memory-investments";
import { InMemoryUserRepository } from "./support/memory-users";

const PASSWORD = "SecurePass123!";

interface Session {
  user: { id: string; email: string };
  token: string;
  refresh_token: string;
}

const finance = () => ({
  expenses: new InMemoryExpenseRepository(),
  goals: new InMemoryGoalRepository(),
  investments: new InMemoryInvestmentRepository()
});

const registration = (overrides: Record<string, unknown> = {}) => ({
  email: "Jane.Doe@Example.com",
  password: PASSWORD,
  first_name: "Jane",
  last_name: "Doe",
  ...overrides
});

describe("finance tracker API", () => {
  let users: InMemoryUserRepository;
  let tokens: TokenService;
  let app: Express;
  let admins: Set<string>;

  beforeEach(() => {
    users = new InMemoryUserRepository();
    tokens = new TokenService({ secret: "test-secret", issuer: "finance-tracker-test" });
    admins = new Set();
    const resolveRole: RoleResolver = (claims) => (admins.has(claims.sub) ? "admin" : "user");
    app = createApp({ tokens, passwords: new PasswordHasher(4), users, resolveRole, ...finance() });
  });

  async function register(overrides: Record<string, unknown> = {}): Promise<Session> {
    const res = await request(app).post("/api/v1/auth/register").send(registration(overrides)).expect(201);
    return res.body;
  }

  describe("GET /health", () => {
    it("answers without a token", async () => {
      const res = await request(app).get("/health").expect(200);
      expect(res.body).toEqual({ status: "ok" });
    });

    it("reports 503 when the health check fails", async () => {
      const sick = createApp({
        tokens,
        passwords: new PasswordHasher(4),
        users,
        ...finance(),
        healthCheck: () => Promise.reject(new Error("connection refused"))
      });
      const res = await request(sick).get("/health").expect(503);
      expect(res.body).toEqual({ status: "unavailable" });
    });
  });

  describe("POST /api/v1/auth/register", () => {
    it("creates the user and returns a session", async () => {
      const body = await register();

      expect(body.user).toMatchObject({ email: "jane.doe@example.com", first_name: "Jane", last_name: "Doe" });
      expect(body.user).not.toHaveProperty("password_hash");
      expect(body.token.split(".")).toHaveLength(3);
      await expect(tokens.validate(body.token)).resolves.toMatchObject({
        sub: body.user.id,
        email: "jane.doe@example.com"
      });

      const stored = await users.findById(body.user.id);
      expect(stored?.password_hash).toMatch(/^\$2[aby]\$04\$/);
    });

    it("reports field and password violations together", async () => {
      const res = await request(app)
        .post("/api/v1/auth/register")
        .send(registration({ email: "not-an-email", first_name: "J", password: "weakpass" }))
        .expect(400);

      expect(res.body.error.code).toBe(400);
      expect(res.body.error.message).toBe(
        "email: invalid email format; " +
          "first_name: first_name must be at least 2 characters long; " +
          "password: password must contain at least one uppercase letter; " +
          "password: password must contain at least one number; " +
          "password: password must contain at least one special character"
      );
      expect(res.body.error.details).toHaveLength(5);
      expect(users.rows.size).toBe(0);
    });

    it("rejects a body of the wrong shape", async () => {
      const res = await request(app).post("/api/v1/auth/register").send({ email: "a@b.co" }).expect(400);
      expect(res.body.error.message).toBe("invalid request body");
    });

    it("refuses a second account for the same email", async () => {
      await register();
      const res = await request(app)
        .post("/api/v1/auth/register")
        .send(registration({ email: "JANE.DOE@example.com" }))
        .expect(409);

      expect(res.body).toEqual({ error: { code: 409, message: "email already registered" } });
    });
  });

  describe("POST /api/v1/auth/login", () => {
    it("returns tokens for the right password", async () => {
      const { user } = await register();
      const res = await request(app)
        .post("/api/v1/auth/login")
        .send({ email: "jane.doe@example.com", password: PASSWORD })
        .expect(200);

      expect(res.body.user.id).toBe(user.id);
      expect(res.body.expires_in).toBe(ACCESS_TOKEN_TTL_SEC);
      await expect(tokens.extractSubjectId(res.body.token)).resolves.toBe(user.id);
      expect((await users.findById(user.id))?.last_login).toBeInstanceOf(Date);
    });

    it("answers the same for a wrong password and an unknown email", async () => {
      await register();
      const wrong = await request(app).post("/api/v1/auth/login").send({ email: "jane.doe@example.com", password: "Nope123!x" });
      const unknown = await request(app).post("/api/v1/auth/login").send({ email: "ghost@example.com", password: PASSWORD });

      expect(wrong.status).toBe(401);
      expect(unknown.status).toBe(401);
      expect(wrong.body).toEqual({ error: { code: 401, message: "invalid credentials" } });
      expect(unknown.body).toEqual(wrong.body);
    });

    it("spends one bcrypt comparison on an unknown email", async () => {
      await register();
      const compare = jest.spyOn(bcrypt, "compare");
      try {
        await request(app).post("/api/v1/auth/login").send({ email: "ghost@example.com", password: PASSWORD }).expect(401);
        expect(compare).toHaveBeenCalledTimes(1);
      } finally {
        compare.mockRestore();
      }
    });

    it("refuses disabled accounts", async () => {
      const { user } = await register();
      const row = users.rows.get(user.id);
      if (row) users.rows.set(user.id, { ...row, is_active: false });

      await request(app).post("/api/v1/auth/login").send({ email: "jane.doe@example.com", password: PASSWORD }).expect(401);
    });
  });

  describe("POST /api/v1/auth/refresh", () => {
    it("trades a refresh token for a new pair", async () => {
      const { user, refresh_token } = await register();
      const res = await request(app).post("/api/v1/auth/refresh").send({ refresh_token }).expect(200);

      await expect(tokens.validate(res.body.token)).resolves.toMatchObject({ sub: user.id, kind: "access" });
      await expect(tokens.validate(res.body.refresh_token)).resolves.toMatchObject({ sub: user.id, kind: "refresh" });
    });

    it("rejects a bad refresh token with 401", async () => {
      const res = await request(app).post("/api/v1/auth/refresh").send({ refresh_token: "nope" }).expect(401);
      expect(res.body).toEqual({ error: { code: 401, message: "Invalid or expired token" } });
    });

    it("rejects an access token when kinds are enforced", async () => {
      const strictTokens = new TokenService({ secret: "test-secret", issuer: "finance-tracker-test", enforceKind: true });
      const strict = createApp({ tokens: strictTokens, passwords: new PasswordHasher(4), users, ...finance() });
      const reg = await request(strict).post("/api/v1/auth/register").send(registration()).expect(201);

      await request(strict).post("/api/v1/auth/refresh").send({ refresh_token: reg.body.token }).expect(401);
      await request(strict).post("/api/v1/auth/refresh").send({ refresh_token: reg.body.refresh_token }).expect(200);
      await request(strict).get("/api/v1/users/me").set("Authorization", `Bearer ${reg.body.refresh_token}`).expect(401);
    });
  });

  describe("users", () => {
    it("requires a token", async () => {
      await request(app).get("/api/v1/users/me").expect(401);
    });

    it("returns the caller profile", async () => {
      const { user, token } = await register();
      const res = await request(app).get("/api/v1/users/me").set("Authorization", `Bearer ${token}`).expect(200);

      expect(res.body).toMatchObject({ id: user.id, email: "jane.doe@example.com" });
    });

    it("serves a profile with an ETag and honours If-None-Match", async () => {
      const { user, token } = await register();
      const first = await request(app).get(`/api/v1/users/${user.id}`).set("Authorization", `Bearer ${token}`).expect(200);
      const etag = first.headers["etag"];

      expect(etag).toMatch(/^W\/"/);
      await request(app)
        .get(`/api/v1/users/${user.id}`)
        .set("Authorization", `Bearer ${token}`)
        .set("If-None-Match", etag)
        .expect(304);
    });

    it("forbids reading someone else's profile", async () => {
      const jane = await register();
      const john = await register({ email: "john@example.com", first_name: "John" });

      await request(app).get(`/api/v1/users/${john.user.id}`).set("Authorization", `Bearer ${jane.token}`).expect(403);
    });

    it("guards the profile whatever the case of the path", async () => {
      const jane = await register();
      const john = await register({ email: "john@example.com", first_name: "John" });

      await request(app).get(`/api/v1/USERS/${john.user.id}`).set("Authorization", `Bearer ${jane.token}`).expect(403);
      await request(app)
        .patch(`/api/v1/Users/${john.user.id}`)
        .set("Authorization", `Bearer ${jane.token}`)
        .send({ first_name: "Hijacked" })
        .expect(403);

      expect((await users.findById(john.user.id))?.first_name).toBe("John");
    });

    it("updates the own profile", async () => {
      const { user, token } = await register();
      const res = await request(app)
        .patch(`/api/v1/users/${user.id}`)
        .set("Authorization", `Bearer ${token}`)
        .send({ first_name: "Janet", phone: "(555) 123-4567", date_of_birth: "1990-04-12" })
        .expect(200);

      expect(res.body).toMatchObject({ first_name: "Janet", last_name: "Doe", phone: "(555) 123-4567", date_of_birth: "1990-04-12" });
    });

    it("validates profile updates", async () => {
      const { user, token } = await register();
      const res = await request(app)
        .patch(`/api/v1/users/${user.id}`)
        .set("Authorization", `Bearer ${token}`)
        .send({ phone: "123", date_of_birth: "1990-02-30" })
        .expect(400);

      expect(res.body.error.message).toBe(
        "phone: phone number must be between 10 and 15 digits; date_of_birth: date_of_birth must be a valid date"
      );
    });

    it("rejects an empty update", async () => {
      const { user, token } = await register();
      await request(app).patch(`/api/v1/users/${user.id}`).set("Authorization", `Bearer ${token}`).send({}).expect(400);
    });
  });

  describe("GET /api/v1/admin/users", () => {
    it("is forbidden to ordinary users", async () => {
      const { token } = await register();
      await request(app).get("/api/v1/admin/users").set("Authorization", `Bearer ${token}`).expect(403);
    });

    it("pages through users newest first for an admin", async () => {
      const admin = await register({ email: "admin@example.com" });
      const second = await register({ email: "second@example.com" });
      const third = await register({ email: "third@example.com" });
      admins.add(admin.user.id);
      const auth = `Bearer ${admin.token}`;

      const page1 = await request(app).get("/api/v1/admin/users?limit=2").set("Authorization", auth).expect(200);
      expect(page1.body.items.map((u: { id: string }) => u.id)).toEqual([third.user.id, second.user.id]);
      expect(typeof page1.body.nextCursor).toBe("string");

      const page2 = await request(app)
        .get(`/api/v1/admin/users?limit=2&cursor=${page1.body.nextCursor}`)
        .set("Authorization", auth)
        .expect(200);
      expect(page2.body.items.map((u: { id: string }) => u.id)).toEqual([admin.user.id]);
      expect(page2.body.nextCursor).toBeNull();
    });

    it("starts from the top when the cursor names no valid id", async () => {
      const admin = await register({ email: "admin@example.com" });
      admins.add(admin.user.id);
      const cursor = encodeCursor("2026-01-01T00:00:05Z", "x");

      const res = await request(app).get(`/api/v1/admin/users?cursor=${cursor}`).set("Authorization", `Bearer ${admin.token}`).expect(200);
      expect(res.body.items.map((u: { id: string }) => u.id)).toEqual([admin.user.id]);
    });

    it("rejects an out-of-range limit", async () => {
      const admin = await register({ email: "admin@example.com" });
      admins.add(admin.user.id);

      const res = await request(app).get("/api/v1/admin/users?limit=500").set("Authorization", `Bearer ${admin.token}`).expect(400);
      expect(res.body.error.message).toBe("limit: limit must be between 1 and 100");
    });
  });
});
