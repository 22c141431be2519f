import type { ConformanceCheck } from '../../domain/ports/ConformanceCheck.js';
import { elementsCheck } from './ElementsCheck.js';
import { knownOrderCheck } from './KnownOrderCheck.js';
import { comparatorCheck } from './ComparatorCheck.js';
import { estimateSizeCheck } from './EstimateSizeCheck.js';
import {
  nullableCheck,
  notImmutableWhenAddSupportedCheck,
  notImmutableWhenRemoveSupportedCheck,
} from './CharacteristicFeatureChecks.js';

export {
  elementsCheck,
  knownOrderCheck,
  comparatorCheck,
  estimateSizeCheck,
  nullableCheck,
  notImmutableWhenAddSupportedCheck,
  notImmutableWhenRemoveSupportedCheck,
};

/** Built-in checks in run order. */
export const DEFAULT_CHECKS: readonly ConformanceCheck[] = [
  elementsCheck,
  knownOrderCheck,
  comparatorCheck,
  estimateSizeCheck,
  nullableCheck,
  notImmutableWhenAddSupportedCheck,
  notImmutableWhenRemoveSupportedCheck,
];
