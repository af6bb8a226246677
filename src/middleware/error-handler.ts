import type { ErrorHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { OperationResult } from "../types/index.ts";
import { ShellError } from "../utils/shell.ts";
import { createLogger } from "../utils/logger.ts";

const log = createLogger("http");

export class AppError extends Error {
  constructor(
    public statusCode: ContentfulStatusCode,
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = "ValidationError";
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, message);
    this.name = "ConflictError";
  }
}

export class ServiceError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, message, details);
    this.name = "ServiceError";
  }
}

/** A bounded wait for the hardware or NetworkManager ran out; retrying later may succeed. */
export class ReadinessError extends AppError {
  constructor(message: string) {
    super(503, message);
    this.name = "ReadinessError";
  }
}

/** Throws the matching AppError for a failed result; returns the warnings of a successful one. */
export function unwrapResult(result: OperationResult): string[] {
  if (result.ok) return result.warnings;
  switch (result.kind) {
    case "validation":
      throw new ValidationError(result.error);
    case "precondition":
      throw new ConflictError(result.error);
    case "readiness-timeout":
      throw new ReadinessError(result.error);
    case "command":
      throw new ServiceError(result.error);
  }
}

export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof AppError) {
    return c.json(
      {
        error: err.name,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
      },
      err.statusCode,
    );
  }

  if (err instanceof ShellError) {
    return c.json(
      {
        error: "ShellError",
        message: err.message,
        details: { command: err.command, exitCode: err.exitCode, stderr: err.stderr },
      },
      500,
    );
  }

  log.error(`Unhandled error: ${err.stack ?? err.message}`);
  return c.json(
    { error: "InternalError", message: "An unexpected error occurred" },
    500,
  );
};
