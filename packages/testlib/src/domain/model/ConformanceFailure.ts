import type { DecompositionStrategy } from '@splitsource/core';

/** Machine-readable failure codes produced by conformance checks. */
export type ConformanceFailureCode =
  | 'ELEMENTS_MISMATCH'
  | 'ORDER_MISMATCH'
  | 'NOT_SORTED'
  | 'COMPARATOR_NOT_REJECTED'
  | 'SIZE_MISMATCH'
  | 'EXACT_SIZE_MISMATCH'
  | 'SUBSIZE_MISMATCH'
  | 'SPLIT_NOT_SHRINKING'
  | 'NONNULL_DECLARED'
  | 'IMMUTABLE_DECLARED'
  | 'CHECK_THREW';

/** One detected defect: which check, which decomposition path, and what diverged. */
export interface ConformanceFailure {
  /** Name of the check that found the defect. */
  readonly check: string;
  readonly code: ConformanceFailureCode;
  /** Human-readable description including expected and actual values. */
  readonly message: string;
  /** Strategy whose traversal diverged. Absent for checks that do not traverse. */
  readonly strategy?: DecompositionStrategy;
  readonly expected?: unknown;
  readonly actual?: unknown;
}

/** Render a failure as a single line: `[check] STRATEGY CODE: message`. */
export function formatFailure(failure: ConformanceFailure): string {
  const where = failure.strategy !== undefined ? ` ${failure.strategy}` : '';
  return `[${failure.check}]${where} ${failure.code}: ${failure.message}`;
}
