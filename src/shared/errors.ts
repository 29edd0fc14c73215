/**
 * Error taxonomy shared by services and routes.
 * The Fastify error handler maps every HavenError to its status code.
 */
export class HavenError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad input: out-of-range coordinates, missing fields, forbidden field writes */
export class ValidationError extends HavenError {
  constructor(message: string, details?: unknown) {
    super(message, 400, "VALIDATION_ERROR", details);
  }
}

export class UnauthorizedError extends HavenError {
  constructor(message = "Caller identity is missing or invalid") {
    super(message, 401, "UNAUTHORIZED");
  }
}

export class ForbiddenError extends HavenError {
  constructor(message: string) {
    super(message, 403, "FORBIDDEN");
  }
}

export class NotFoundError extends HavenError {
  constructor(entity: string, id?: string) {
    super(id ? `${entity} ${id} not found` : `${entity} not found`, 404, "NOT_FOUND");
  }
}

/** Illegal status transition or a duplicate one-to-one record */
export class ConflictError extends HavenError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

/**
 * A delivery channel failed. Recorded on the communication log and retried
 * by the retry scan; never surfaces to HTTP callers.
 */
export class TransientDeliveryError extends HavenError {
  constructor(
    public readonly channel: string,
    reason: string,
    public readonly responseCode?: number
  ) {
    super(`${channel} delivery failed: ${reason}`, 502, "DELIVERY_FAILED");
  }
}

/** Communication failed with no retry left */
export class PermanentFailure extends HavenError {
  constructor(communicationId: string, attempts: number) {
    super(
      `Communication ${communicationId} failed after ${attempts} attempt(s)`,
      502,
      "PERMANENT_FAILURE"
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
