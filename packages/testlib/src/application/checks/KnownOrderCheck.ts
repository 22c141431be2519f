import { Characteristic } from '@splitsource/core';
import type { ConformanceCheck, CheckContext } from '../../domain/ports/ConformanceCheck.js';
import type { ConformanceFailure } from '../../domain/model/ConformanceFailure.js';
import { splitStallFailure, traverse } from '../../domain/services/GuardedTraversal.js';
import { firstDifference, formatElements } from '../../domain/services/ElementMatcher.js';

const CHECK_NAME = 'knownOrder';

/** An `ORDERED` source visits elements in the collection's iteration order under every strategy. */
export const knownOrderCheck: ConformanceCheck = {
  name: CHECK_NAME,
  description: 'an ORDERED source visits elements in iteration order under every strategy',

  run<E>(context: CheckContext<E>): ConformanceFailure[] {
    const { subject } = context;
    if (!subject.splitSource().hasCharacteristics(Characteristic.ORDERED)) {
      return [];
    }

    const expected = subject.orderedElements();
    const failures: ConformanceFailure[] = [];

    for (const strategy of context.strategies) {
      const traversal = traverse(strategy, subject.splitSource());
      if (traversal.stall !== null) {
        failures.push(splitStallFailure(CHECK_NAME, strategy, traversal.stall));
        continue;
      }
      const actual = traversal.elements;
      const position = firstDifference(expected, actual, context.equivalence);
      if (position < 0) continue;

      failures.push({
        check: CHECK_NAME,
        code: 'ORDER_MISMATCH',
        strategy,
        expected,
        actual,
        message:
          `visited ${formatElements(actual)}, expected ${formatElements(expected)} in order ` +
          `(first difference at position ${String(position)})`,
      });
    }

    return failures;
  },
};
