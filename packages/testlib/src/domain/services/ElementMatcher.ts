import { inspect } from 'node:util';
import type { Equivalence } from '../model/Equivalence.js';

/** Elements present on one side of a multiset comparison but not the other. */
export interface MultisetDiff<E> {
  /** Expected elements that were never visited (with multiplicity). */
  readonly missing: readonly E[];
  /** Visited elements beyond what was expected, including duplicates. */
  readonly unexpected: readonly E[];
}

/**
 * Compare two element lists as multisets under `equivalence`.
 *
 * Quadratic: each expected element claims the first unclaimed equivalent
 * visited element. Fine for test-sized collections.
 */
export function multisetDiff<E>(
  expected: readonly E[],
  actual: readonly E[],
  equivalence: Equivalence<E>,
): MultisetDiff<E> {
  const unclaimed = [...actual];
  const missing: E[] = [];

  for (const element of expected) {
    const at = unclaimed.findIndex((candidate) => equivalence(element, candidate));
    if (at < 0) {
      missing.push(element);
    } else {
      unclaimed.splice(at, 1);
    }
  }

  return { missing, unexpected: unclaimed };
}

/** Index of the first position where the sequences differ, or `-1` when they are equal. */
export function firstDifference<E>(expected: readonly E[], actual: readonly E[], equivalence: Equivalence<E>): number {
  const shared = Math.min(expected.length, actual.length);
  for (let i = 0; i < shared; i++) {
    if (!equivalence(expected[i], actual[i])) return i;
  }
  return expected.length === actual.length ? -1 : shared;
}

/** Render elements on one line for failure messages. */
export function formatElements(elements: readonly unknown[]): string {
  return inspect(elements, { breakLength: Infinity, depth: 3, maxArrayLength: 50 });
}
