import { Characteristic, formatCharacteristics } from '@splitsource/core';
import type { ConformanceCheck, CheckContext } from '../../domain/ports/ConformanceCheck.js';
import type { ConformanceFailure } from '../../domain/model/ConformanceFailure.js';
import { CollectionFeature } from '../../domain/model/CollectionFeature.js';
import { CollectionSize } from '../../domain/model/CollectionSize.js';

const CHECK_NAME = 'nullable';

/** A non-empty collection that accepts null must not hand out `NONNULL` sources. */
export const nullableCheck: ConformanceCheck = {
  name: CHECK_NAME,
  description: 'a collection that allows nulls does not declare NONNULL',
  requires: [CollectionFeature.ALLOWS_NULL_VALUES],
  absentSizes: [CollectionSize.ZERO],

  run<E>(context: CheckContext<E>): ConformanceFailure[] {
    const declared = context.subject.splitSource().characteristics();
    if ((declared & Characteristic.NONNULL) === 0) return [];

    return [
      {
        check: CHECK_NAME,
        code: 'NONNULL_DECLARED',
        expected: 'NONNULL absent',
        actual: formatCharacteristics(declared),
        message: `source declares NONNULL but ${context.subject.name} allows null elements`,
      },
    ];
  },
};

function notImmutableCheck(name: string, feature: CollectionFeature, operation: string): ConformanceCheck {
  return {
    name,
    description: `a collection that supports ${operation} does not declare IMMUTABLE`,
    requires: [feature],

    run<E>(context: CheckContext<E>): ConformanceFailure[] {
      const declared = context.subject.splitSource().characteristics();
      if ((declared & Characteristic.IMMUTABLE) === 0) return [];

      return [
        {
          check: name,
          code: 'IMMUTABLE_DECLARED',
          expected: 'IMMUTABLE absent',
          actual: formatCharacteristics(declared),
          message: `source declares IMMUTABLE but ${context.subject.name} supports ${operation}`,
        },
      ];
    },
  };
}

export const notImmutableWhenAddSupportedCheck = notImmutableCheck(
  'notImmutableWhenAddSupported',
  CollectionFeature.SUPPORTS_ADD,
  'add',
);

export const notImmutableWhenRemoveSupportedCheck = notImmutableCheck(
  'notImmutableWhenRemoveSupported',
  CollectionFeature.SUPPORTS_REMOVE,
  'remove',
);
