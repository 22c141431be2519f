import { Sources } from '@splitsource/core';
import type { SplitSource } from '@splitsource/core';
import type { CollectionUnderTest } from '../../domain/ports/CollectionUnderTest.js';
import { CollectionFeature } from '../../domain/model/CollectionFeature.js';
import { sameValueZero } from '../../domain/model/Equivalence.js';

const FEATURES: ReadonlySet<CollectionFeature> = new Set([
  CollectionFeature.ALLOWS_NULL_VALUES,
  CollectionFeature.SUPPORTS_ADD,
  CollectionFeature.SUPPORTS_REMOVE,
]);

/** Growable list that accepts nulls. Sources are `ORDERED`, `SIZED` and `SUBSIZED` snapshots. */
export class ArrayListCollection<E> implements CollectionUnderTest<E> {
  readonly features = FEATURES;
  private readonly elements: E[];

  constructor(
    readonly name: string,
    elements: Iterable<E> = [],
  ) {
    this.elements = [...elements];
  }

  add(element: E): void {
    this.elements.push(element);
  }

  /** Remove the first occurrence of `element`. Returns `false` if there was none. */
  remove(element: E): boolean {
    const index = this.elements.findIndex((candidate) => sameValueZero(candidate, element));
    if (index < 0) return false;
    this.elements.splice(index, 1);
    return true;
  }

  splitSource(): SplitSource<E> {
    return Sources.fromArray(this.elements);
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
}
