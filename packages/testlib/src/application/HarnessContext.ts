import type { Comparator, DecompositionStrategy } from '@splitsource/core';
import type { CheckContext, ConformanceCheck } from '../domain/ports/ConformanceCheck.js';
import type { CollectionUnderTest } from '../domain/ports/CollectionUnderTest.js';
import type { Equivalence } from '../domain/model/Equivalence.js';
import type { CheckRegistry } from './CheckRegistry.js';
import type { EventBus } from './EventBus.js';

/**
 * Resolved settings shared by the harness use cases. Built once by
 * `ConformanceHarness` from its config; the registry may still grow.
 */
export class HarnessContext<E> {
  constructor(
    readonly eventBus: EventBus,
    readonly registry: CheckRegistry,
    readonly strategies: readonly DecompositionStrategy[],
    readonly equivalence: Equivalence<E>,
    readonly naturalComparator: Comparator<E>,
    /** Check names to run, or `null` for every registered check. */
    readonly selectedChecks: readonly string[] | null,
  ) {}

  /** Checks to consider for a run, in registration order. */
  checksToRun(): ConformanceCheck[] {
    const all = this.registry.list();
    const selected = this.selectedChecks;
    if (selected === null) return all;
    return all.filter((check) => selected.includes(check.name));
  }

  checkContext(subject: CollectionUnderTest<E>): CheckContext<E> {
    return {
      subject,
      strategies: this.strategies,
      equivalence: this.equivalence,
      naturalComparator: this.naturalComparator,
    };
  }
}
