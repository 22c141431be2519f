import type { ConformanceFailure } from './ConformanceFailure.js';
import { formatFailure } from './ConformanceFailure.js';

/** Outcome of one check against one collection. */
export const CheckStatus = {
  PASSED: 'PASSED',
  FAILED: 'FAILED',
  SKIPPED: 'SKIPPED',
} as const;

export type CheckStatus = (typeof CheckStatus)[keyof typeof CheckStatus];

export interface CheckOutcome {
  readonly check: string;
  readonly status: CheckStatus;
  /** Empty unless `status` is `FAILED`. */
  readonly failures: readonly ConformanceFailure[];
  /** Why the check was not run. Set only when `status` is `SKIPPED`. */
  readonly skipReason?: string;
}

/** Result of running the harness against one collection. */
export interface ConformanceReport {
  /** Name of the collection under test. */
  readonly collection: string;
  /** `true` if no check failed. Skipped checks do not count against it. */
  readonly passed: boolean;
  readonly outcomes: readonly CheckOutcome[];
  /** All failures across all checks, in check order. */
  readonly failures: readonly ConformanceFailure[];
}

export function passedOutcome(check: string): CheckOutcome {
  return { check, status: CheckStatus.PASSED, failures: [] };
}

export function failedOutcome(check: string, failures: readonly ConformanceFailure[]): CheckOutcome {
  return { check, status: CheckStatus.FAILED, failures };
}

export function skippedOutcome(check: string, skipReason: string): CheckOutcome {
  return { check, status: CheckStatus.SKIPPED, failures: [], skipReason };
}

export function buildReport(collection: string, outcomes: readonly CheckOutcome[]): ConformanceReport {
  const failures = outcomes.flatMap((outcome) => outcome.failures);
  return {
    collection,
    passed: outcomes.every((outcome) => outcome.status !== CheckStatus.FAILED),
    outcomes,
    failures,
  };
}

/** Thrown by `assertConformance()` when a report contains failures. */
export class ConformanceError extends Error {
  readonly report: ConformanceReport;

  constructor(report: ConformanceReport) {
    const lines = report.failures.map((failure) => `  - ${formatFailure(failure)}`);
    super(
      `${report.collection} failed ${String(report.failures.length)} conformance assertion(s):\n${lines.join('\n')}`,
    );
    this.name = 'ConformanceError';
    this.report = report;
  }

  get failures(): readonly ConformanceFailure[] {
    return this.report.failures;
  }
}

/** Throw a `ConformanceError` listing every failure unless the report passed. */
export function assertConformance(report: ConformanceReport): void {
  if (!report.passed) {
    throw new ConformanceError(report);
  }
}
