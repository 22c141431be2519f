import { describe, expect, it } from 'vitest';
import type { CollectionUnderTest } from '../../domain/ports/CollectionUnderTest.js';
import { formatFailure } from '../../domain/model/ConformanceFailure.js';
import { ConformanceHarness } from '../../ConformanceHarness.js';
import type { ConformanceHarnessConfig } from '../../ConformanceHarness.js';

/** One registered test: its title and the check it runs. */
export interface ConformanceTest {
  readonly title: string;
  readonly check: string;
}

/** Tests `describeConformance` registers for `subject`. Checks gated off by feature or size get none. */
export function conformanceTests<E>(harness: ConformanceHarness<E>, subject: CollectionUnderTest<E>): ConformanceTest[] {
  return harness
    .plan(subject)
    .filter((planned) => planned.enabled)
    .map((planned) => ({ title: `${planned.name}: ${planned.description}`, check: planned.name }));
}

/**
 * Register a `describe` block named after `subject` with one test per
 * selected check that applies to it.
 *
 * @example
 * ```typescript
 * describeConformance(new ArrayListCollection('numbers', [1, 2, 3]));
 * ```
 */
export function describeConformance<E>(
  subject: CollectionUnderTest<E>,
  config: ConformanceHarnessConfig<E> = {},
): void {
  const harness = new ConformanceHarness(config);

  describe(`${subject.name} conformance`, () => {
    for (const test of conformanceTests(harness, subject)) {
      it(test.title, () => {
        const outcome = harness.runCheck(subject, test.check);
        expect(outcome.failures.map(formatFailure)).toEqual([]);
      });
    }
  });
}
