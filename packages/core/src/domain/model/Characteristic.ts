/**
 * Traits a split source declares about the elements it has not yet visited.
 *
 * Each flag is an independent bit. Nothing derives one flag from another: a
 * producer that declares `SUBSIZED` is expected to declare `SIZED` as well,
 * but that is its obligation, not something this module enforces.
 */
export const Characteristic = {
  /** No two visited elements are equivalent. */
  DISTINCT: 0x00000001,
  /** Elements are visited in the order of `comparator()` (or natural order when it is `null`). */
  SORTED: 0x00000004,
  /** Elements have a defined encounter order that splitting and traversal respect. */
  ORDERED: 0x00000010,
  /** `estimateSize()` is the exact number of remaining elements. */
  SIZED: 0x00000040,
  /** No visited element is `null` or `undefined`. */
  NONNULL: 0x00000100,
  /** The backing elements cannot be added, removed or replaced while traversing. */
  IMMUTABLE: 0x00000400,
  /** The backing elements may change concurrently without external coordination. */
  CONCURRENT: 0x00001000,
  /** Every source produced by `trySplit()` is `SIZED` and `SUBSIZED`. */
  SUBSIZED: 0x00004000,
} as const;

export type Characteristic = (typeof Characteristic)[keyof typeof Characteristic];

/** Bitwise union of `Characteristic` flags. */
export type CharacteristicSet = number;

export const NO_CHARACTERISTICS: CharacteristicSet = 0;

/** Combine flags into a single set. */
export function characteristicsOf(...flags: readonly Characteristic[]): CharacteristicSet {
  let set = NO_CHARACTERISTICS;
  for (const flag of flags) {
    set |= flag;
  }
  return set;
}

/** Return `true` if every bit of `flags` is present in `set`. */
export function hasAll(set: CharacteristicSet, flags: CharacteristicSet): boolean {
  return (set & flags) === flags;
}

/** Names of the flags present in `set`, lowest bit first. Unknown bits are ignored. */
export function describeCharacteristics(set: CharacteristicSet): string[] {
  return Object.entries(Characteristic)
    .filter(([, bit]) => (set & bit) !== 0)
    .map(([name]) => name);
}

/** Render a set as `ORDERED | SIZED`, or `none` when empty. */
export function formatCharacteristics(set: CharacteristicSet): string {
  const names = describeCharacteristics(set);
  return names.length > 0 ? names.join(' | ') : 'none';
}
