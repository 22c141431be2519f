import type { CollectionUnderTest } from '../../domain/ports/CollectionUnderTest.js';
import type { HarnessContext } from '../HarnessContext.js';

/** One selected check and whether it applies to the collection. */
export interface PlannedCheck {
  readonly name: string;
  readonly description: string;
  readonly enabled: boolean;
  /** Set only when `enabled` is `false`. */
  readonly skipReason?: string;
}

/** Use case: list which checks a run would execute or skip, without running any. */
export class PlanConformance<E> {
  constructor(private readonly ctx: HarnessContext<E>) {}

  execute(subject: CollectionUnderTest<E>): PlannedCheck[] {
    return this.ctx.checksToRun().map((check) => {
      const skipReason = this.ctx.registry.skipReason(check, subject);
      if (skipReason === null) {
        return { name: check.name, description: check.description, enabled: true };
      }
      return { name: check.name, description: check.description, enabled: false, skipReason };
    });
  }
}
