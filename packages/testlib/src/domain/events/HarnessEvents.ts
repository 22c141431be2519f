import type { DecompositionStrategy } from '@splitsource/core';
import type { ConformanceFailure } from '../model/ConformanceFailure.js';

/** Emitted when `run()` begins, after checks have been selected. */
export interface HarnessStartedEvent {
  readonly type: 'harness:started';
  readonly collection: string;
  readonly checks: readonly string[];
  readonly strategies: readonly DecompositionStrategy[];
  readonly timestamp: number;
}

/** Emitted before an enabled check runs. */
export interface CheckStartedEvent {
  readonly type: 'check:started';
  readonly collection: string;
  readonly check: string;
  readonly timestamp: number;
}

/** Emitted when a check finds no defect. */
export interface CheckPassedEvent {
  readonly type: 'check:passed';
  readonly collection: string;
  readonly check: string;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when a check reports at least one failure. */
export interface CheckFailedEvent {
  readonly type: 'check:failed';
  readonly collection: string;
  readonly check: string;
  readonly failures: readonly ConformanceFailure[];
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted for a check whose feature or size gate excludes the collection. */
export interface CheckSkippedEvent {
  readonly type: 'check:skipped';
  readonly collection: string;
  readonly check: string;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted after every selected check has run or been skipped. */
export interface HarnessCompletedEvent {
  readonly type: 'harness:completed';
  readonly collection: string;
  readonly passed: boolean;
  readonly passedCount: number;
  readonly failedCount: number;
  readonly skippedCount: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Discriminated union of all harness events. */
export type HarnessEvent =
  | HarnessStartedEvent
  | CheckStartedEvent
  | CheckPassedEvent
  | CheckFailedEvent
  | CheckSkippedEvent
  | HarnessCompletedEvent;

/** String literal union of all event type names. */
export type EventType = HarnessEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<HarnessEvent, { type: T }>;
