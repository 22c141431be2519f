/** Machine-readable codes for errors raised by split sources. */
export type SplitSourceErrorCode = 'INVALID_ARGUMENT' | 'ILLEGAL_STATE';

/** Base class for errors thrown by the traversal protocol itself. */
export class SplitSourceError extends Error {
  readonly code: SplitSourceErrorCode;

  constructor(code: SplitSourceErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * An operation received an argument it cannot work with (a missing visit
 * function, a negative length). Raised before any state changes.
 */
export class InvalidArgumentError extends SplitSourceError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/**
 * The call is not valid for this source's declared characteristics, e.g.
 * `comparator()` on a source that is not `SORTED`. Callers consult
 * `characteristics()` first; there is no recovery other than fixing the call.
 */
export class IllegalStateError extends SplitSourceError {
  constructor(message: string) {
    super('ILLEGAL_STATE', message);
  }
}
