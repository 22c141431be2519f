import { Characteristic } from '@splitsource/core';
import type { ConformanceCheck, CheckContext } from '../../domain/ports/ConformanceCheck.js';
import type { ConformanceFailure } from '../../domain/model/ConformanceFailure.js';

const CHECK_NAME = 'estimateSize';

/**
 * A `SIZED` source reports the exact element count. A `SUBSIZED` source keeps
 * the count across one split: prefix plus remainder equals the pre-split size,
 * and a successful split shrinks the remainder.
 */
export const estimateSizeCheck: ConformanceCheck = {
  name: CHECK_NAME,
  description: 'SIZED sources report the exact count; SUBSIZED splits preserve it',

  run<E>(context: CheckContext<E>): ConformanceFailure[] {
    const source = context.subject.splitSource();
    if (!source.hasCharacteristics(Characteristic.SIZED)) {
      return [];
    }

    const count = context.subject.size();
    const failures: ConformanceFailure[] = [];

    const estimate = source.estimateSize();
    if (estimate !== count) {
      failures.push({
        check: CHECK_NAME,
        code: 'SIZE_MISMATCH',
        expected: count,
        actual: estimate,
        message: `estimateSize() is ${String(estimate)} but the collection holds ${String(count)} element(s)`,
      });
    }

    const exact = source.exactSizeIfKnown();
    if (exact !== count) {
      failures.push({
        check: CHECK_NAME,
        code: 'EXACT_SIZE_MISMATCH',
        expected: count,
        actual: exact,
        message: `exactSizeIfKnown() is ${String(exact)} but the collection holds ${String(count)} element(s)`,
      });
    }

    if (!source.hasCharacteristics(Characteristic.SUBSIZED)) {
      return failures;
    }

    const prefix = source.trySplit();
    const remainder = source.estimateSize();
    const prefixSize = prefix === null ? 0 : prefix.estimateSize();

    if (prefixSize + remainder !== estimate) {
      failures.push({
        check: CHECK_NAME,
        code: 'SUBSIZE_MISMATCH',
        expected: estimate,
        actual: prefixSize + remainder,
        message:
          `after one split, prefix ${String(prefixSize)} + remainder ${String(remainder)} ` +
          `does not add up to the pre-split size ${String(estimate)}`,
      });
    }

    if (prefix !== null && remainder >= estimate) {
      failures.push({
        check: CHECK_NAME,
        code: 'SPLIT_NOT_SHRINKING',
        expected: `< ${String(estimate)}`,
        actual: remainder,
        message: `trySplit() returned a prefix but the remainder stayed at ${String(remainder)} of ${String(estimate)}`,
      });
    }

    return failures;
  },
};
