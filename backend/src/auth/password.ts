// src/auth/password.ts
import crypto from "crypto";
import bcrypt from "bcrypt";
import { ConfigurationError, InvalidCredentialsError, PolicyViolationError } from "../errors";
import { ValidationErrors } from "../utils/validation";

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;
/** bcrypt's own default; roughly 50-100ms per hash on current hardware. */
export const DEFAULT_BCRYPT_COST = 10;
/** bcrypt ignores everything past this many bytes of input. */
export const BCRYPT_MAX_INPUT_BYTES = 72;

export type StrengthLabel = "Very Weak" | "Weak" | "Medium" | "Strong" | "Very Strong";

interface CharClasses {
  upper: boolean;
  lower: boolean;
  digit: boolean;
  symbol: boolean;
}

function classify(password: string): CharClasses {
  return {
    upper: /\p{Lu}/u.test(password),
    lower: /\p{Ll}/u.test(password),
    digit: /\p{N}/u.test(password),
    symbol: /[\p{P}\p{S}]/u.test(password)
  };
}

// lengths are UTF-8 bytes: "Ä" counts 2
const lengthOf = (password: string) => Buffer.byteLength(password, "utf8");

/** Every rule is checked so the caller can report all violations at once. */
export function validatePasswordStrength(password: string): ValidationErrors {
  const errors = new ValidationErrors();
  const length = lengthOf(password);
  const has = classify(password);

  if (length < PASSWORD_MIN_LENGTH) {
    errors.add("password", `password must be at least ${PASSWORD_MIN_LENGTH} characters long`);
  }
  if (length > PASSWORD_MAX_LENGTH) {
    errors.add("password", `password must be no more than ${PASSWORD_MAX_LENGTH} characters long`);
  }
  if (!has.upper) errors.add("password", "password must contain at least one uppercase letter");
  if (!has.lower) errors.add("password", "password must contain at least one lowercase letter");
  if (!has.digit) errors.add("password", "password must contain at least one number");
  if (!has.symbol) errors.add("password", "password must contain at least one special character");

  return errors;
}

/** UX hint only (0-100), not a measure of entropy. */
export function passwordStrength(password: string): number {
  const length = lengthOf(password);
  const has = classify(password);
  let score = 0;

  if (length >= 8) score += 20;
  if (length >= 12) score += 10;
  if (length >= 16) score += 10;

  if (has.upper) score += 15;
  if (has.lower) score += 15;
  if (has.digit) score += 15;
  if (has.symbol) score += 15;
  if (has.upper && has.lower) score += 10;

  return Math.min(score, 100);
}

export function strengthLabelFor(score: number): StrengthLabel {
  if (score >= 80) return "Very Strong";
  if (score >= 60) return "Strong";
  if (score >= 40) return "Medium";
  if (score >= 20) return "Weak";
  return "Very Weak";
}

export function passwordStrengthLabel(password: string): StrengthLabel {
  return strengthLabelFor(passwordStrength(password));
}

/**
 * bcrypt wrapper. The encoded hash carries its own salt and cost, so
 * verify() needs nothing but the stored string.
 */
export class PasswordHasher {
  readonly cost: number;
  private placeholder?: Promise<string>;

  constructor(cost = DEFAULT_BCRYPT_COST) {
    if (!Number.isInteger(cost) || cost < 4 || cost > 31) {
      throw new ConfigurationError(`bcrypt cost must be an integer in 4..31, got ${cost}`);
    }
    this.cost = cost;
  }

  /**
   * Rejects with PolicyViolationError before any hashing if the policy fails,
   * or if the password is longer than bcrypt reads.
   */
  async hash(password: string): Promise<string> {
    const errors = validatePasswordStrength(password);
    if (errors.hasErrors()) throw new PolicyViolationError(errors);
    if (lengthOf(password) > BCRYPT_MAX_INPUT_BYTES) {
      throw new PolicyViolationError(
        new ValidationErrors().add("password", `password must be no more than ${BCRYPT_MAX_INPUT_BYTES} bytes long`)
      );
    }
    return bcrypt.hash(password, this.cost);
  }

  /** Wrong password and malformed hash fail identically. */
  async verify(hash: string, password: string): Promise<void> {
    // no stored hash covers more than 72 bytes; a longer input would match on its prefix
    if (lengthOf(password) > BCRYPT_MAX_INPUT_BYTES) throw new InvalidCredentialsError();

    let ok: boolean;
    try {
      ok = await bcrypt.compare(password, hash);
    } catch (err) {
      throw new InvalidCredentialsError({ cause: err });
    }
    if (!ok) throw new InvalidCredentialsError();
  }

  /**
   * A hash at this hasher's cost of a random secret, made once. Verifying
   * against it costs what a real check costs and never succeeds.
   */
  placeholderHash(): Promise<string> {
    this.placeholder ??= bcrypt.hash(crypto.randomBytes(32).toString("base64"), this.cost);
    return this.placeholder;
  }
}
