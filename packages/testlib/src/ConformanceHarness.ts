import { ALL_STRATEGIES, InvalidArgumentError, isDecompositionStrategy, naturalOrder } from '@splitsource/core';
import type { Comparator, DecompositionStrategy } from '@splitsource/core';
import type { EventType, EventPayload, HarnessEvent } from './domain/events/HarnessEvents.js';
import type { ConformanceCheck } from './domain/ports/ConformanceCheck.js';
import type { CollectionUnderTest } from './domain/ports/CollectionUnderTest.js';
import type { CheckOutcome, ConformanceReport } from './domain/model/ConformanceReport.js';
import { assertConformance } from './domain/model/ConformanceReport.js';
import type { Equivalence } from './domain/model/Equivalence.js';
import { sameValueZero } from './domain/model/Equivalence.js';
import { CheckRegistry } from './application/CheckRegistry.js';
import { EventBus } from './application/EventBus.js';
import type { HandlerErrorListener } from './application/EventBus.js';
import { HarnessContext } from './application/HarnessContext.js';
import { RunCheck } from './application/usecases/RunCheck.js';
import { RunConformance } from './application/usecases/RunConformance.js';
import { PlanConformance } from './application/usecases/PlanConformance.js';
import type { PlannedCheck } from './application/usecases/PlanConformance.js';

/** Configuration for a conformance run. */
export interface ConformanceHarnessConfig<E> {
  /** Strategies every traversal check cross-checks. Default: all three, in declaration order. */
  readonly strategies?: readonly string[];
  /** When two elements count as equal. Default: SameValueZero. */
  readonly equivalence?: Equivalence<E>;
  /** Ordering used when a `SORTED` source reports a `null` comparator. Default: `naturalOrder`. */
  readonly naturalComparator?: Comparator<E>;
  /** Names of the checks to run. Default: every registered check. */
  readonly checks?: readonly string[];
  /**
   * Checks to choose from. Default: `CheckRegistry.withDefaults()`.
   * Custom checks named in `checks` must already be registered here.
   */
  readonly registry?: CheckRegistry;
  /** Receives errors thrown by event subscribers. Default: `process.emitWarning`. */
  readonly onHandlerError?: HandlerErrorListener;
}

function resolveStrategies(names: readonly string[] | undefined): DecompositionStrategy[] {
  if (names === undefined) return [...ALL_STRATEGIES];
  if (names.length === 0) {
    throw new InvalidArgumentError('At least one decomposition strategy is required');
  }

  const strategies: DecompositionStrategy[] = [];
  for (const name of names) {
    if (!isDecompositionStrategy(name)) {
      throw new InvalidArgumentError(
        `Unknown decomposition strategy '${name}'. Expected one of: ${ALL_STRATEGIES.join(', ')}`,
      );
    }
    strategies.push(name);
  }
  return strategies;
}

function resolveChecks(registry: CheckRegistry, names: readonly string[] | undefined): readonly string[] | null {
  if (names === undefined) return null;

  const unknown = names.filter((name) => !registry.has(name));
  if (unknown.length > 0) {
    throw new InvalidArgumentError(
      `Unknown check(s): ${unknown.join(', ')}. Registered: ${registry.names().join(', ')}`,
    );
  }
  return names;
}

/**
 * Facade for verifying that a collection's split sources conform to the
 * traversal contract.
 *
 * Each enabled check drains a fresh source per strategy and compares the
 * results; defects are collected into a `ConformanceReport` rather than thrown.
 *
 * @example
 * ```typescript
 * const harness = new ConformanceHarness<number>({ strategies: ['BULK_DRAIN', 'MAXIMUM_SPLIT'] });
 * harness.on('check:failed', (event) => console.error(event.check, event.failures));
 * const report = harness.run(new ArrayListCollection('numbers', [3, 1, 2]));
 * ```
 */
export class ConformanceHarness<E> {
  private readonly ctx: HarnessContext<E>;

  constructor(config: ConformanceHarnessConfig<E> = {}) {
    const registry = config.registry ?? CheckRegistry.withDefaults();
    this.ctx = new HarnessContext<E>(
      new EventBus(config.onHandlerError),
      registry,
      resolveStrategies(config.strategies),
      config.equivalence ?? sameValueZero,
      config.naturalComparator ?? naturalOrder,
      resolveChecks(registry, config.checks),
    );
  }

  get strategies(): readonly DecompositionStrategy[] {
    return this.ctx.strategies;
  }

  /** Subscribe to a harness event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe from a harness event. Returns `this` for chaining. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to every harness event. Returns `this` for chaining. */
  onAny(handler: (event: HarnessEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler. Returns `this` for chaining. */
  offAny(handler: (event: HarnessEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /** Add a custom check to this harness's registry. Returns `this` for chaining. */
  register(check: ConformanceCheck): this {
    this.ctx.registry.register(check);
    return this;
  }

  /** Which checks `run()` would execute or skip for `subject`. */
  plan(subject: CollectionUnderTest<E>): PlannedCheck[] {
    return new PlanConformance(this.ctx).execute(subject);
  }

  /** Run every selected check and return the report. Never throws for defects. */
  run(subject: CollectionUnderTest<E>): ConformanceReport {
    return new RunConformance(this.ctx).execute(subject);
  }

  /** Run a single registered check by name. */
  runCheck(subject: CollectionUnderTest<E>, name: string): CheckOutcome {
    const check = this.ctx.registry.get(name);
    if (check === null) {
      throw new InvalidArgumentError(`Unknown check '${name}'. Registered: ${this.ctx.registry.names().join(', ')}`);
    }
    return new RunCheck(this.ctx).execute(subject, check);
  }

  /** Run and throw `ConformanceError` listing every failure, if any. */
  assertConforms(subject: CollectionUnderTest<E>): ConformanceReport {
    const report = this.run(subject);
    assertConformance(report);
    return report;
  }
}
