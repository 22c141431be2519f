import { Characteristic, IllegalStateError, isOrdered } from '@splitsource/core';
import type { ConformanceCheck, CheckContext } from '../../domain/ports/ConformanceCheck.js';
import type { ConformanceFailure } from '../../domain/model/ConformanceFailure.js';
import { splitStallFailure, traverse } from '../../domain/services/GuardedTraversal.js';
import { formatElements } from '../../domain/services/ElementMatcher.js';

const CHECK_NAME = 'comparator';

function describeThrown(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}

/**
 * A `SORTED` source visits elements in non-decreasing order under its own
 * comparator (natural ordering when it reports `null`). Any other source
 * must refuse `comparator()` with `IllegalStateError`.
 */
export const comparatorCheck: ConformanceCheck = {
  name: CHECK_NAME,
  description: 'SORTED sources visit in comparator order; others reject comparator()',

  run<E>(context: CheckContext<E>): ConformanceFailure[] {
    const { subject } = context;

    if (subject.splitSource().hasCharacteristics(Characteristic.SORTED)) {
      const failures: ConformanceFailure[] = [];
      for (const strategy of context.strategies) {
        const source = subject.splitSource();
        const comparator = source.comparator() ?? context.naturalComparator;
        const traversal = traverse(strategy, source);
        if (traversal.stall !== null) {
          failures.push(splitStallFailure(CHECK_NAME, strategy, traversal.stall));
          continue;
        }
        const actual = traversal.elements;
        if (isOrdered(actual, comparator)) continue;

        failures.push({
          check: CHECK_NAME,
          code: 'NOT_SORTED',
          strategy,
          expected: [...actual].sort(comparator),
          actual,
          message: `visited ${formatElements(actual)}, which is not in non-decreasing comparator order`,
        });
      }
      return failures;
    }

    try {
      subject.splitSource().comparator();
    } catch (error) {
      if (error instanceof IllegalStateError) return [];
      return [
        {
          check: CHECK_NAME,
          code: 'COMPARATOR_NOT_REJECTED',
          expected: 'IllegalStateError',
          actual: describeThrown(error),
          message: `comparator() on a source without SORTED threw ${describeThrown(error)} instead of IllegalStateError`,
        },
      ];
    }

    return [
      {
        check: CHECK_NAME,
        code: 'COMPARATOR_NOT_REJECTED',
        expected: 'IllegalStateError',
        actual: 'no error',
        message: 'comparator() on a source without SORTED returned instead of throwing IllegalStateError',
      },
    ];
  },
};
