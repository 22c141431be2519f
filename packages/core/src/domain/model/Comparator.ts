import { InvalidArgumentError } from '../errors/SplitSourceError.js';

/** Total ordering over `E`: negative, zero or positive like `Array.prototype.sort`. */
export type Comparator<E> = (a: E, b: E) => number;

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function describeOperand(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'Date';
  return typeof value;
}

/**
 * Natural ordering for values that have one: numbers, bigints, strings,
 * booleans (`false` first) and Dates. Both operands must be of the same kind.
 *
 * @throws InvalidArgumentError for `null`, `undefined`, mixed kinds, or objects.
 */
export function naturalOrder<E>(a: E, b: E): number {
  if (typeof a === 'number' && typeof b === 'number') return compareNumbers(a, b);
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (a instanceof Date && b instanceof Date) return compareNumbers(a.getTime(), b.getTime());

  throw new InvalidArgumentError(
    `No natural ordering between ${describeOperand(a)} and ${describeOperand(b)}; supply a comparator`,
  );
}

/** Return `true` if `elements` is non-decreasing under `comparator`. */
export function isOrdered<E>(elements: readonly E[], comparator: Comparator<E>): boolean {
  for (let i = 1; i < elements.length; i++) {
    if (comparator(elements[i - 1], elements[i]) > 0) {
      return false;
    }
  }
  return true;
}
