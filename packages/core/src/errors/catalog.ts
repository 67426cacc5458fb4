/**
 * Typed error catalog for box operations.
 *
 * Every error carries a stable `errorCode` and a `details` record naming the
 * box, source, operation or object key it concerns.
 */

export type ErrorDetails = Record<string, unknown>;

export class ColdboxError extends Error {
  /** Whether repeating the same call may succeed. */
  readonly retryable: boolean = false;

  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: ErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Lookup errors

export class NotFoundError extends ColdboxError {
  constructor(message: string, details?: ErrorDetails) {
    super("NOT_FOUND", message, details);
  }
}

export class DuplicateError extends ColdboxError {
  constructor(message: string, details?: ErrorDetails) {
    super("DUPLICATE", message, details);
  }
}

export class BoxNotFoundError extends ColdboxError {
  constructor(box: string) {
    super("BOX_NOT_FOUND", `Box not found: ${box}`, { box });
  }
}

export class BoxExistsError extends ColdboxError {
  constructor(box: string) {
    super("BOX_EXISTS", `Box already exists: ${box}`, { box });
  }
}

export class InvalidBoxNameError extends ColdboxError {
  constructor(box: string) {
    super("INVALID_BOX_NAME", `Invalid box name: ${JSON.stringify(box)}`, {
      box,
    });
  }
}

// Backend errors

export class TransientBackendError extends ColdboxError {
  override readonly retryable = true;

  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super("BACKEND_TRANSIENT", message, details, { cause });
  }
}

export class FatalBackendError extends ColdboxError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super("BACKEND_FATAL", message, details, { cause });
  }
}

// Data integrity

export class DecodeError extends ColdboxError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super("DECODE_FAILED", message, details, { cause });
  }
}

// Local state

export class JobConflictError extends ColdboxError {
  constructor(kind: string, subject: string) {
    super("JOB_CONFLICT", `A ${kind} job already exists for ${subject || "box"}`, {
      kind,
      subject,
    });
  }
}

export class LockTimeoutError extends ColdboxError {
  constructor(lockPath: string, cause?: unknown) {
    super("LOCK_TIMEOUT", `Box is locked by another process: ${lockPath}`, {
      lockPath,
    }, { cause });
  }
}

export class KeyMismatchError extends ColdboxError {
  constructor(keyPath: string, expected: string, found: string) {
    super("KEY_MISMATCH", `Key file ${keyPath} does not hold key ${expected}`, {
      keyPath,
      expected,
      found,
    });
  }
}

export class UnsupportedSchemaError extends ColdboxError {
  constructor(found: string, expected: string) {
    super(
      "UNSUPPORTED_SCHEMA",
      `Unsupported box database schema version: ${found}`,
      { found, expected },
    );
  }
}

export function isColdboxError(err: unknown): err is ColdboxError {
  return err instanceof ColdboxError;
}
