// src/middleware/error.ts
import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { HttpError } from "../errors";
import { logger } from "../logger";
import { ValidationErrors } from "../utils/validation";

interface ErrorBody {
  error: { code: number; message: string; details?: unknown };
}

function send(res: Response, code: number, message: string, details?: unknown) {
  const body: ErrorBody = { error: { code, message } };
  if (details !== undefined) body.error.details = details;
  res.status(code).json(body);
}

// body-parser failures (bad JSON, oversized payload) carry a 4xx `status`
function clientStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof HttpError) return send(res, err.status, err.message, err.details);

  if (err instanceof ZodError) {
    return send(res, 400, "invalid request body", new ValidationErrors().collectIssues(err).toArray());
  }

  const status = clientStatus(err);
  if (status !== undefined && err instanceof Error) return send(res, status, err.message);

  logger.error({ err, path: req.path, method: req.method }, "unhandled error");
  send(res, 500, "internal_error");
}
