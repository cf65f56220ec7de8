/**
 * Errors a service can throw to end a request with a specific status.
 * The error handler turns them into the standard `{ ok: false, error }` body.
 */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly meta?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** User-correctable input problem, e.g. a meal without an item name. */
export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message, { type: "validation" });
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message: string = "Unauthorized") {
    super(401, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string = "Resource not found") {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}
