import { Characteristic, characteristicsOf } from './domain/model/Characteristic.js';
import type { CharacteristicSet } from './domain/model/Characteristic.js';
import { IndexedSource } from './infrastructure/sources/IndexedSource.js';
import type { IndexFunction, IndexedSourceOptions } from './infrastructure/sources/IndexedSource.js';
import { SingletonSource } from './infrastructure/sources/SingletonSource.js';

/** Source over one element. */
export function singleton<E>(value: E): SingletonSource<E> {
  return new SingletonSource(value);
}

/** Source over `[0, length)` read through `indexFunction`. */
export function range<E>(
  length: number,
  indexFunction: IndexFunction<E>,
  options?: IndexedSourceOptions<E>,
): IndexedSource<E> {
  return new IndexedSource(length, indexFunction, options);
}

/**
 * `ORDERED` source over a snapshot of `elements`, taken now. Later changes to
 * the array are not seen. `characteristics` are declared in addition.
 */
export function fromArray<E>(elements: readonly E[], characteristics: CharacteristicSet = 0): IndexedSource<E> {
  const snapshot = elements.slice();
  return new IndexedSource(snapshot.length, (index) => snapshot[index], {
    characteristics: characteristics | Characteristic.ORDERED,
  });
}

const EMPTY_CHARACTERISTICS = characteristicsOf(Characteristic.ORDERED, Characteristic.IMMUTABLE, Characteristic.DISTINCT);

function noElementAt(index: number): never {
  throw new RangeError(`Empty source has no element at index ${String(index)}`);
}

/** Source with nothing left to visit. */
export function empty<E>(): IndexedSource<E> {
  return new IndexedSource<E>(0, noElementAt, { characteristics: EMPTY_CHARACTERISTICS });
}

/**
 * Factory functions for the built-in sources.
 *
 * @example
 * ```typescript
 * const squares = Sources.range(5, (i) => i * i);
 * const parts = new SourcePartitioner(2).partition(squares);
 * ```
 */
export const Sources = { singleton, range, fromArray, empty } as const;
