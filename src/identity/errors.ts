/**
 * Failure taxonomy of the identity service.
 *
 * Every failure is terminal for the request that hit it except StorageError,
 * which the authority retries (re-read and re-apply the compare-and-swap)
 * before any response is produced.
 */

export type IdentityErrorKind = "unauthorized" | "conflict" | "validation" | "storage";

export abstract class IdentityError extends Error {
  abstract readonly kind: IdentityErrorKind;
  /** HTTP status the gateway answers with. */
  abstract readonly status: 400 | 401 | 500;
}

/** Bad signature, missing prior registration, or an invalid/consumed owner token. */
export class UnauthorizedError extends IdentityError {
  readonly name = "UnauthorizedError" as const;
  readonly kind = "unauthorized" as const;
  readonly status = 401 as const;
}

/**
 * An irreversible transition already happened (operator already registered,
 * workload already exposed). Answered with 400, like any other bad request.
 */
export class ConflictError extends IdentityError {
  readonly name = "ConflictError" as const;
  readonly kind = "conflict" as const;
  readonly status = 400 as const;
}

/** Authenticated request with invalid payload content. */
export class ValidationError extends IdentityError {
  readonly name = "ValidationError" as const;
  readonly kind = "validation" as const;
  readonly status = 400 as const;

  constructor(
    message: string,
    /** Offending payload field, when there is one. */
    readonly field?: string,
  ) {
    super(message);
  }
}

/** The durable store could not commit or returned an unreadable record. */
export class StorageError extends IdentityError {
  readonly name = "StorageError" as const;
  readonly kind = "storage" as const;
  readonly status = 500 as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isIdentityError(err: unknown): err is IdentityError {
  return err instanceof IdentityError;
}
