import { Characteristic, InvalidArgumentError, Sources, characteristicsOf } from '@splitsource/core';
import type { SplitSource } from '@splitsource/core';
import type { CollectionUnderTest } from '../../domain/ports/CollectionUnderTest.js';
import type { CollectionFeature } from '../../domain/model/CollectionFeature.js';

const CHARACTERISTICS = characteristicsOf(Characteristic.IMMUTABLE, Characteristic.NONNULL);

/** Fixed list without nulls. Sources add `IMMUTABLE` and `NONNULL` to the ordered snapshot flags. */
export class ImmutableListCollection<E> implements CollectionUnderTest<E> {
  readonly features: ReadonlySet<CollectionFeature> = new Set<CollectionFeature>();
  private readonly elements: readonly E[];

  constructor(
    readonly name: string,
    elements: Iterable<E>,
  ) {
    const copy = [...elements];
    const nullAt = copy.findIndex((element) => element === null || element === undefined);
    if (nullAt >= 0) {
      throw new InvalidArgumentError(`${name} does not accept null elements (found one at index ${String(nullAt)})`);
    }
    this.elements = copy;
  }

  splitSource(): SplitSource<E> {
    return Sources.fromArray(this.elements, CHARACTERISTICS);
  }

  sampleElements(): readonly E[] {
    return this.elements;
  }

  orderedElements(): readonly E[] {
    return this.elements;
  }

  size(): number {
    return this.elements.length;
  }
}
