import { Characteristic, InvalidArgumentError, IndexedSource, characteristicsOf, naturalOrder } from '@splitsource/core';
import type { Comparator, SplitSource } from '@splitsource/core';
import type { CollectionUnderTest } from '../../domain/ports/CollectionUnderTest.js';
import { CollectionFeature } from '../../domain/model/CollectionFeature.js';

const FEATURES: ReadonlySet<CollectionFeature> = new Set([
  CollectionFeature.SUPPORTS_ADD,
  CollectionFeature.SUPPORTS_REMOVE,
]);

const CHARACTERISTICS = characteristicsOf(
  Characteristic.SORTED,
  Characteristic.ORDERED,
  Characteristic.DISTINCT,
  Characteristic.NONNULL,
);

/**
 * Set kept in ascending order. Elements comparing equal are stored once.
 * With no comparator, elements use `naturalOrder` and sources report a
 * `null` comparator.
 */
export class SortedSetCollection<E> implements CollectionUnderTest<E> {
  readonly features = FEATURES;
  private readonly elements: E[] = [];
  private readonly order: Comparator<E>;

  constructor(
    readonly name: string,
    elements: Iterable<E> = [],
    private readonly comparator: Comparator<E> | null = null,
  ) {
    this.order = comparator ?? naturalOrder;
    for (const element of elements) {
      this.add(element);
    }
  }

  /** Insert `element` unless an equal one is present. Returns `true` if inserted. */
  add(element: E): boolean {
    if (element === null || element === undefined) {
      throw new InvalidArgumentError(`${this.name} does not accept null elements`);
    }
    const index = this.search(element);
    if (index < this.elements.length && this.order(this.elements[index], element) === 0) {
      return false;
    }
    this.elements.splice(index, 0, element);
    return true;
  }

  remove(element: E): boolean {
    const index = this.search(element);
    if (index >= this.elements.length || this.order(this.elements[index], element) !== 0) {
      return false;
    }
    this.elements.splice(index, 1);
    return true;
  }

  splitSource(): SplitSource<E> {
    const snapshot = this.elements.slice();
    return new IndexedSource(snapshot.length, (index) => snapshot[index], {
      characteristics: CHARACTERISTICS,
      comparator: this.comparator,
    });
  }

  sampleElements(): readonly E[] {
    return [...this.elements];
  }

  orderedElements(): readonly E[] {
    return [...this.elements];
  }

  size(): number {
    return this.elements.length;
  }

  // Lowest index whose element is not less than `element`.
  private search(element: E): number {
    let low = 0;
    let high = this.elements.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.order(this.elements[mid], element) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
