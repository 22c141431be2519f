import type { ConformanceCheck } from '../../domain/ports/ConformanceCheck.js';
import type { CollectionUnderTest } from '../../domain/ports/CollectionUnderTest.js';
import type { ConformanceFailure } from '../../domain/model/ConformanceFailure.js';
import type { CheckOutcome } from '../../domain/model/ConformanceReport.js';
import { failedOutcome, passedOutcome, skippedOutcome } from '../../domain/model/ConformanceReport.js';
import type { HarnessContext } from '../HarnessContext.js';

function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

/** Use case: run one check against one collection, honouring its gate. */
export class RunCheck<E> {
  constructor(private readonly ctx: HarnessContext<E>) {}

  execute(subject: CollectionUnderTest<E>, check: ConformanceCheck): CheckOutcome {
    const skipReason = this.ctx.registry.skipReason(check, subject);
    if (skipReason !== null) {
      this.ctx.eventBus.emit({
        type: 'check:skipped',
        collection: subject.name,
        check: check.name,
        reason: skipReason,
        timestamp: Date.now(),
      });
      return skippedOutcome(check.name, skipReason);
    }

    this.ctx.eventBus.emit({
      type: 'check:started',
      collection: subject.name,
      check: check.name,
      timestamp: Date.now(),
    });

    const startedAt = Date.now();
    const failures = this.runGuarded(subject, check);
    const durationMs = Date.now() - startedAt;

    if (failures.length > 0) {
      this.ctx.eventBus.emit({
        type: 'check:failed',
        collection: subject.name,
        check: check.name,
        failures,
        durationMs,
        timestamp: Date.now(),
      });
      return failedOutcome(check.name, failures);
    }

    this.ctx.eventBus.emit({
      type: 'check:passed',
      collection: subject.name,
      check: check.name,
      durationMs,
      timestamp: Date.now(),
    });
    return passedOutcome(check.name);
  }

  // A source that throws mid-traversal is a defect of the collection, so it
  // is reported like any other failure rather than aborting the run.
  private runGuarded(subject: CollectionUnderTest<E>, check: ConformanceCheck): readonly ConformanceFailure[] {
    try {
      return check.run(this.ctx.checkContext(subject));
    } catch (error) {
      return [
        {
          check: check.name,
          code: 'CHECK_THREW',
          actual: error,
          message: `check threw ${describeError(error)}`,
        },
      ];
    }
  }
}
