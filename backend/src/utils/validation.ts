// src/utils/validation.ts
import type { ZodError, ZodIssue } from "zod";
import { EmailAddress, IsoDay, Uuid } from "../types/dto";

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Ordered set of field failures collected during one validation pass.
 * An empty set means the input is valid.
 */
export class ValidationErrors {
  private readonly entries: FieldError[] = [];

  add(field: string, message: string): this {
    this.entries.push({ field, message });
    return this;
  }

  /** Append a single-field validator result, if it failed. */
  collect(error: FieldError | undefined): this {
    if (error) this.entries.push(error);
    return this;
  }

  /** One entry per zod issue, keyed by its dotted path. */
  collectIssues(error: ZodError): this {
    for (const issue of error.issues) this.entries.push({ field: issue.path.join("."), message: issue.message });
    return this;
  }

  merge(other: ValidationErrors): this {
    this.entries.push(...other.entries);
    return this;
  }

  hasErrors(): boolean {
    return this.entries.length > 0;
  }

  get size(): number {
    return this.entries.length;
  }

  toArray(): FieldError[] {
    return this.entries.map((e) => ({ ...e }));
  }

  /** "field: message; field: message", insertion order; "" when empty. */
  render(): string {
    return this.entries.map((e) => `${e.field}: ${e.message}`).join("; ");
  }

  toString(): string {
    return this.render();
  }
}

const fail = (field: string, message: string): FieldError => ({ field, message });

const NAME_RE = /^[a-zA-Z\s\-']+$/;

// zod reports checks in declaration order, so the first issue is the first rule broken
function firstIssue(result: { success: true } | { success: false; error: ZodError }): ZodIssue | undefined {
  return result.success ? undefined : result.error.issues[0];
}

export function validateEmail(email: string): FieldError | undefined {
  if (email === "") return fail("email", "email is required");
  const issue = firstIssue(EmailAddress.safeParse(email));
  if (!issue) return undefined;
  if (issue.code === "too_big") return fail("email", "email too long (max 254 characters)");
  return fail("email", "invalid email format");
}

export function validateRequired(value: string, field: string): FieldError | undefined {
  return value.trim() === "" ? fail(field, `${field} is required`) : undefined;
}

/** Bounds apply to the trimmed value; a bound of 0 is not checked. */
export function validateLength(value: string, field: string, min: number, max: number): FieldError | undefined {
  const length = value.trim().length;
  if (min > 0 && length < min) return fail(field, `${field} must be at least ${min} characters long`);
  if (max > 0 && length > max) return fail(field, `${field} must be no more than ${max} characters long`);
  return undefined;
}

export function validateName(name: string, field: string): FieldError | undefined {
  const err = validateRequired(name, field) ?? validateLength(name, field, 2, 100);
  if (err) return err;
  if (!NAME_RE.test(name)) {
    return fail(field, `${field} can only contain letters, spaces, hyphens, and apostrophes`);
  }
  return undefined;
}

export function validatePhone(phone: string): FieldError | undefined {
  if (phone === "") return fail("phone", "phone number is required");
  const digits = phone.replace(/\D/g, "");
  if (digits.length < 10 || digits.length > 15) {
    return fail("phone", "phone number must be between 10 and 15 digits");
  }
  return undefined;
}

export function validateAmount(amount: number, field: string): FieldError | undefined {
  if (!Number.isFinite(amount) || amount <= 0) return fail(field, `${field} must be greater than 0`);
  if (amount > 999_999_999.99) return fail(field, `${field} is too large (max 999,999,999.99)`);
  return undefined;
}

export function validateDate(date: string, field: string): FieldError | undefined {
  const err = validateRequired(date, field);
  if (err) return err;
  const issue = firstIssue(IsoDay.safeParse(date));
  if (!issue) return undefined;
  if (issue.code === "invalid_string" && issue.validation === "regex") {
    return fail(field, `${field} must be in YYYY-MM-DD format`);
  }
  return fail(field, `${field} must be a valid date`);
}

export function validateUuid(value: string, field: string): FieldError | undefined {
  const err = validateRequired(value, field);
  if (err) return err;
  if (!Uuid.safeParse(value).success) return fail(field, `${field} must be a valid UUID`);
  return undefined;
}

export function validatePagination(page: number, limit: number): FieldError | undefined {
  if (page < 1) return fail("page", "page must be greater than 0");
  if (limit < 1 || limit > 100) return fail("limit", "limit must be between 1 and 100");
  return undefined;
}

/** "asc" or "desc" in any case; empty means the caller's default. */
export function validateSortOrder(sortOrder: string): FieldError | undefined {
  if (sortOrder === "") return undefined;
  const normalized = sortOrder.toLowerCase();
  if (normalized !== "asc" && normalized !== "desc") {
    return fail("sort_order", "sort_order must be 'asc' or 'desc'");
  }
  return undefined;
}
