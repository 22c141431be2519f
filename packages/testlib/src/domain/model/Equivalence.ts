/** Decides whether two elements count as the same element when comparing results. */
export type Equivalence<E> = (a: E, b: E) => boolean;

/** `Object.is`, except that `0` and `-0` are equal. Same rule as `Map` keys and `Array.prototype.includes`. */
export function sameValueZero<E>(a: E, b: E): boolean {
  return a === b || (a !== a && b !== b);
}
