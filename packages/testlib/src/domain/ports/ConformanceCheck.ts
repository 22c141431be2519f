import type { Comparator, DecompositionStrategy } from '@splitsource/core';
import type { CollectionFeature } from '../model/CollectionFeature.js';
import type { CollectionSize } from '../model/CollectionSize.js';
import type { ConformanceFailure } from '../model/ConformanceFailure.js';
import type { Equivalence } from '../model/Equivalence.js';
import type { CollectionUnderTest } from './CollectionUnderTest.js';

/** Everything a check needs to examine one collection. */
export interface CheckContext<E> {
  readonly subject: CollectionUnderTest<E>;
  /** Strategies to cross-check, in run order. */
  readonly strategies: readonly DecompositionStrategy[];
  readonly equivalence: Equivalence<E>;
  /** Ordering used when a `SORTED` source reports a `null` comparator. */
  readonly naturalComparator: Comparator<E>;
}

/**
 * Port for a single conformance check, registered in a `CheckRegistry`.
 *
 * A check is enabled for a collection only when every feature in `requires`
 * is declared and the collection's size bucket is not in `absentSizes`.
 * `run` reports defects as failures; it throws only on harness misuse.
 */
export interface ConformanceCheck {
  readonly name: string;
  readonly description: string;
  readonly requires?: readonly CollectionFeature[];
  readonly absentSizes?: readonly CollectionSize[];
  run<E>(context: CheckContext<E>): readonly ConformanceFailure[];
}
