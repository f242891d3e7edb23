/**
 * Error taxonomy for the gateway.
 *
 * Every error that crosses a component boundary is an AppError so the HTTP
 * layer can map it to a status code without inspecting messages. Errors with
 * `expose: false` are rendered with a generic message.
 */

export interface FieldError {
  field: string;
  message: string;
}

export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  /** Whether the message is safe to show to clients */
  readonly expose: boolean = true;
  /** Whether the orchestrating caller may retry */
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Durability layer unreachable or a record failed validation */
export class StoreUnavailableError extends AppError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly statusCode = 503;
  override readonly expose = false;
  override readonly retryable = true;
}

/** Jellyfin unreachable, 5xx, or timed out */
export class UpstreamUnavailableError extends AppError {
  readonly code = 'UPSTREAM_UNAVAILABLE';
  readonly statusCode = 502;
  override readonly expose = false;
  override readonly retryable = true;

  constructor(
    message: string,
    readonly upstreamStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Jellyfin rejected a request with a non-auth 4xx */
export class UpstreamRequestError extends AppError {
  readonly code = 'UPSTREAM_REJECTED';
  readonly statusCode = 502;
  override readonly expose = false;

  constructor(
    message: string,
    readonly upstreamStatus: number
  ) {
    super(message);
  }
}

/** Jellyfin rejected the stored access token; the session is no longer valid */
export class AuthExpiredError extends AppError {
  readonly code = 'AUTH_EXPIRED';
  readonly statusCode = 401;
}

/** A compare-and-swap lost a race; resolved by re-reading the winner */
export class ConflictError extends AppError {
  readonly code = 'CONFLICT';
  readonly statusCode = 409;

  constructor(
    readonly key: string,
    readonly expectedVersion: number | null,
    readonly actualVersion: number | null
  ) {
    super(
      `Version conflict on ${key}: expected ${expectedVersion ?? 'absent'}, found ${actualVersion ?? 'absent'}`
    );
  }
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
}

export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(
    message: string,
    readonly fields: FieldError[] = []
  ) {
    super(message);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Message for logs: error message plus cause chain, never the stack
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  return cause === undefined ? error.message : `${error.message} (cause: ${describeError(cause)})`;
}
