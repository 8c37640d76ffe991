export class InvalidFilterError extends Error {
  override readonly name = 'InvalidFilterError';

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidSelectionError extends Error {
  override readonly name = 'InvalidSelectionError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TokenNotFoundError extends Error {
  override readonly name = 'TokenNotFoundError';

  constructor(
    readonly token: string,
    message?: string,
  ) {
    super(message ?? `Selection token '${token}' does not exist`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TokenExpiredError extends Error {
  override readonly name = 'TokenExpiredError';

  constructor(
    readonly token: string,
    readonly expiredAt: Date,
    message?: string,
  ) {
    super(message ?? `Selection token '${token}' expired at ${expiredAt.toISOString()}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Transient: the token store could not be reached. Callers may retry with backoff. */
export class StoreUnavailableError extends Error {
  override readonly name = 'StoreUnavailableError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The record source failed while evaluating a filter. */
export class RecordSourceError extends Error {
  override readonly name = 'RecordSourceError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised by the resolver when the record source fails mid-stream.
 * `emitted` is the number of ids already handed to the consumer; those are final.
 */
export class ResolutionInterruptedError extends Error {
  override readonly name = 'ResolutionInterruptedError';

  constructor(
    readonly emitted: number,
    override readonly cause?: unknown,
    message?: string,
  ) {
    super(message ?? `Resolution interrupted after ${emitted} record(s): ${String(cause)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Per-record failure thrown by a bulk action. `kind` is the action's own
 * classification and is reported as-is in the operation result.
 */
export class ActionError extends Error {
  override readonly name = 'ActionError';

  constructor(
    readonly kind: string,
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
