import { InvalidArgumentError } from '../errors/SplitSourceError.js';

/** Fail fast when a caller hands in something other than a visit function. */
export function requireVisitor(visit: unknown): void {
  if (typeof visit !== 'function') {
    throw new InvalidArgumentError(`Expected a visit function, got ${visit === null ? 'null' : typeof visit}`);
  }
}

/** Require a non-negative safe integer, e.g. a length or an index bound. */
export function requireCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${String(value)}`);
  }
}
