import type { SplitSource } from '@splitsource/core';
import type { CollectionUnderTest } from '../../domain/ports/CollectionUnderTest.js';
import type { CollectionFeature } from '../../domain/model/CollectionFeature.js';

export interface CustomCollectionOptions<E> {
  readonly name: string;
  /** Produces a new source on every call. */
  readonly splitSource: () => SplitSource<E>;
  /** Expected contents in iteration order. */
  readonly elements: readonly E[];
  /** Default: none. */
  readonly features?: Iterable<CollectionFeature>;
  /** Expected element count when it differs from `elements.length`. */
  readonly size?: number;
}

/**
 * Collection assembled from a source factory and the elements it should
 * yield. Use it to put a hand-written source through the harness.
 *
 * @example
 * ```typescript
 * const subject = new CustomCollection({
 *   name: 'evens',
 *   elements: [0, 2, 4],
 *   splitSource: () => Sources.range(3, (i) => i * 2),
 * });
 * ```
 */
export class CustomCollection<E> implements CollectionUnderTest<E> {
  readonly name: string;
  readonly features: ReadonlySet<CollectionFeature>;
  private readonly factory: () => SplitSource<E>;
  private readonly elements: readonly E[];
  private readonly count: number;

  constructor(options: CustomCollectionOptions<E>) {
    this.name = options.name;
    this.features = new Set(options.features ?? []);
    this.factory = options.splitSource;
    this.elements = [...options.elements];
    this.count = options.size ?? this.elements.length;
  }

  splitSource(): SplitSource<E> {
    return this.factory();
  }

  sampleElements(): readonly E[] {
    return this.elements;
  }

  orderedElements(): readonly E[] {
    return this.elements;
  }

  size(): number {
    return this.count;
  }
}
