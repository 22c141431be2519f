import type { CharacteristicSet } from '../model/Characteristic.js';
import type { Comparator } from '../model/Comparator.js';

/** Callback invoked once per visited element. */
export type Visitor<E> = (element: E) => void;

/**
 * Port for a cursor over a sequence of elements that can be drained
 * sequentially or split into disjoint sub-sources.
 *
 * A source has exactly one owner. Its cursor operations are not synchronized
 * and must not be called concurrently on the same object. After `trySplit()`
 * the parent and the returned prefix share no mutable state, so each may be
 * handed to a different worker.
 *
 * Characteristics are fixed for the object's lifetime. Violating a declared
 * characteristic is not detected here; the conformance harness finds it.
 */
export interface SplitSource<E> {
  /**
   * Visit one remaining element and advance past it. Returns `false` without
   * touching state when nothing remains. The cursor advances even when
   * `visit` throws; the error propagates.
   */
  tryAdvance(visit: Visitor<E>): boolean;
  /** Visit every remaining element in turn. Observably identical to looping on `tryAdvance`. */
  forEachRemaining(visit: Visitor<E>): void;
  /**
   * Hand a strict prefix of the remaining elements to a new source and keep
   * only the suffix. Returns `null` when the remainder cannot be divided.
   * A non-null result always shrinks this source's remaining size.
   */
  trySplit(): SplitSource<E> | null;
  /** Upper bound on the remaining elements; exact when `SIZED` is declared. */
  estimateSize(): number;
  /** `estimateSize()` when `SIZED` is declared, otherwise `-1`. */
  exactSizeIfKnown(): number;
  characteristics(): CharacteristicSet;
  /** `true` if every flag in `flags` is declared. */
  hasCharacteristics(flags: CharacteristicSet): boolean;
  /**
   * The ordering of a `SORTED` source; `null` means natural ordering.
   *
   * @throws IllegalStateError when `SORTED` is not declared.
   */
  comparator(): Comparator<E> | null;
}
