import type { ConformanceCheck, CheckContext } from '../../domain/ports/ConformanceCheck.js';
import type { ConformanceFailure } from '../../domain/model/ConformanceFailure.js';
import { splitStallFailure, traverse } from '../../domain/services/GuardedTraversal.js';
import { formatElements, multisetDiff } from '../../domain/services/ElementMatcher.js';

const CHECK_NAME = 'elements';

/** Every strategy visits each expected element exactly once, in any order. */
export const elementsCheck: ConformanceCheck = {
  name: CHECK_NAME,
  description: 'every strategy visits the expected elements exactly once each',

  run<E>(context: CheckContext<E>): ConformanceFailure[] {
    const expected = context.subject.sampleElements();
    const failures: ConformanceFailure[] = [];

    for (const strategy of context.strategies) {
      const traversal = traverse(strategy, context.subject.splitSource());
      if (traversal.stall !== null) {
        failures.push(splitStallFailure(CHECK_NAME, strategy, traversal.stall));
        continue;
      }
      const actual = traversal.elements;
      const { missing, unexpected } = multisetDiff(expected, actual, context.equivalence);
      if (missing.length === 0 && unexpected.length === 0) continue;

      failures.push({
        check: CHECK_NAME,
        code: 'ELEMENTS_MISMATCH',
        strategy,
        expected,
        actual,
        message:
          `visited ${formatElements(actual)}, expected ${formatElements(expected)} in any order ` +
          `(missing ${formatElements(missing)}, unexpected ${formatElements(unexpected)})`,
      });
    }

    return failures;
  },
};
