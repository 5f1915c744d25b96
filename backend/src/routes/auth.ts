// src/routes/auth.ts
import { Router } from "express";
import type { PasswordHasher } from "../auth/password";
import { validatePasswordStrength } from "../auth/password";
import { ACCESS_TOKEN_TTL_SEC, type TokenService } from "../auth/tokens";
import { AuthError, ConflictError, InvalidCredentialsError, PolicyViolationError } from "../errors";
import { logger } from "../logger";
import { LoginDto, RefreshDto, RegisterDto } from "../types/dto";
import { toProfile, type User, type UserRepository } from "../types/user";
import { ValidationErrors, validateDate, validateEmail, validateName, validatePhone } from "../utils/validation";

export interface AuthRouteDeps {
  tokens: TokenService;
  passwords: PasswordHasher;
  users: UserRepository;
}

const normalizeEmail = (email: string) => email.trim().toLowerCase();

export default function authRoutes({ tokens, passwords, users }: AuthRouteDeps) {
  const r = Router();

  async function session(user: User) {
    const [token, refresh_token] = await Promise.all([
      tokens.issueAccessToken(user.id, user.email),
      tokens.issueRefreshToken(user.id)
    ]);
    return { user: toProfile(user), token, refresh_token, expires_in: ACCESS_TOKEN_TTL_SEC };
  }

  // Register: all field and password rules reported together
  r.post("/api/v1/auth/register", async (req, res, next) => {
    try {
      const dto = RegisterDto.parse(req.body);
      const email = normalizeEmail(dto.email);

      const errors = new ValidationErrors()
        .collect(validateEmail(email))
        .collect(validateName(dto.first_name, "first_name"))
        .collect(validateName(dto.last_name, "last_name"));
      if (dto.phone !== undefined) errors.collect(validatePhone(dto.phone));
      if (dto.date_of_birth !== undefined) errors.collect(validateDate(dto.date_of_birth, "date_of_birth"));
      errors.merge(validatePasswordStrength(dto.password));
      if (errors.hasErrors()) throw new PolicyViolationError(errors);

      if (await users.findByEmail(email)) throw new ConflictError("email already registered");

      const user = await users.create({
        email,
        password_hash: await passwords.hash(dto.password),
        first_name: dto.first_name.trim(),
        last_name: dto.last_name.trim(),
        phone: dto.phone ?? null,
        date_of_birth: dto.date_of_birth ?? null
      });
      logger.info({ user_id: user.id }, "user registered");
      res.status(201).json(await session(user));
    } catch (e) { next(e); }
  });

  // Login: unknown email, disabled account and wrong password all answer the same
  r.post("/api/v1/auth/login", async (req, res, next) => {
    try {
      const dto = LoginDto.parse(req.body);
      const user = await users.findByEmail(normalizeEmail(dto.email));
      if (!user || !user.is_active) {
        // unknown and disabled accounts cost one bcrypt comparison too
        await passwords.verify(await passwords.placeholderHash(), dto.password);
        throw new InvalidCredentialsError();
      }
      await passwords.verify(user.password_hash, dto.password);

      await users.touchLastLogin(user.id);
      logger.info({ user_id: user.id }, "user logged in");
      res.json(await session({ ...user, last_login: new Date() }));
    } catch (e) { next(e); }
  });

  // Refresh: trade a refresh token for a fresh pair
  r.post("/api/v1/auth/refresh", async (req, res, next) => {
    try {
      const { refresh_token } = RefreshDto.parse(req.body);
      const claims = await tokens.validate(refresh_token, "refresh");
      const user = await users.findById(claims.sub);
      if (!user || !user.is_active) throw new AuthError();
      res.json(await session(user));
    } catch (e) { next(e); }
  });

  return r;
}
