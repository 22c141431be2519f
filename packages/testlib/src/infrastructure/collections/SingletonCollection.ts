import { SingletonSource } from '@splitsource/core';
import type { SplitSource } from '@splitsource/core';
import type { CollectionUnderTest } from '../../domain/ports/CollectionUnderTest.js';
import { CollectionFeature } from '../../domain/model/CollectionFeature.js';

const FEATURES: ReadonlySet<CollectionFeature> = new Set([CollectionFeature.ALLOWS_NULL_VALUES]);

/** Exactly one element, which may be `null`. */
export class SingletonCollection<E> implements CollectionUnderTest<E> {
  readonly features = FEATURES;

  constructor(
    readonly name: string,
    private readonly value: E,
  ) {}

  splitSource(): SplitSource<E> {
    return new SingletonSource(this.value);
  }

  sampleElements(): readonly E[] {
    return [this.value];
  }

  orderedElements(): readonly E[] {
    return [this.value];
  }

  size(): number {
    return 1;
  }
}
