import type { ZodError } from "zod";

/** An error the HTTP layer answers with its own status and message. */
export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }

  static fromZod(error: ZodError): ValidationError {
    const issue = error.issues[0];
    if (!issue) return new ValidationError("Invalid input");
    const field = issue.path.join(".");
    return new ValidationError(field ? `${field}: ${issue.message}` : issue.message);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized") {
    super(message, 401);
  }
}

/** The actor lacks the permission a mutation or read needs. Nothing was written. */
export class AccessDeniedError extends AppError {
  constructor(message = "You do not have permission to access this resource.") {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(what: string) {
    super(`${what} not found`, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}
