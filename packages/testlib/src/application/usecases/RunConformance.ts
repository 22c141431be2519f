import type { CollectionUnderTest } from '../../domain/ports/CollectionUnderTest.js';
import type { ConformanceReport } from '../../domain/model/ConformanceReport.js';
import { CheckStatus, buildReport } from '../../domain/model/ConformanceReport.js';
import type { HarnessContext } from '../HarnessContext.js';
import { RunCheck } from './RunCheck.js';

/** Use case: run every selected check against a collection and build the report. */
export class RunConformance<E> {
  constructor(private readonly ctx: HarnessContext<E>) {}

  execute(subject: CollectionUnderTest<E>): ConformanceReport {
    const checks = this.ctx.checksToRun();
    const startedAt = Date.now();

    this.ctx.eventBus.emit({
      type: 'harness:started',
      collection: subject.name,
      checks: checks.map((check) => check.name),
      strategies: this.ctx.strategies,
      timestamp: startedAt,
    });

    const runCheck = new RunCheck(this.ctx);
    const outcomes = checks.map((check) => runCheck.execute(subject, check));
    const report = buildReport(subject.name, outcomes);

    const count = (status: CheckStatus): number => outcomes.filter((outcome) => outcome.status === status).length;

    this.ctx.eventBus.emit({
      type: 'harness:completed',
      collection: subject.name,
      passed: report.passed,
      passedCount: count(CheckStatus.PASSED),
      failedCount: count(CheckStatus.FAILED),
      skippedCount: count(CheckStatus.SKIPPED),
      durationMs: Date.now() - startedAt,
      timestamp: Date.now(),
    });

    return report;
  }
}
