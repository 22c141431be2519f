import { InvalidArgumentError } from '@splitsource/core';
import type { ConformanceCheck } from '../domain/ports/ConformanceCheck.js';
import type { CollectionUnderTest } from '../domain/ports/CollectionUnderTest.js';
import { collectionSizeOf } from '../domain/model/CollectionSize.js';
import { DEFAULT_CHECKS } from './checks/index.js';

/**
 * Name-keyed table of conformance checks, kept in registration order.
 *
 * Each check carries its own gate (`requires`, `absentSizes`); the registry
 * evaluates it against a collection's declared features and size bucket.
 */
export class CheckRegistry {
  private readonly checks = new Map<string, ConformanceCheck>();

  /** A registry holding the built-in checks. */
  static withDefaults(): CheckRegistry {
    const registry = new CheckRegistry();
    for (const check of DEFAULT_CHECKS) {
      registry.register(check);
    }
    return registry;
  }

  register(check: ConformanceCheck): this {
    if (check.name.length === 0) {
      throw new InvalidArgumentError('Check name must not be empty');
    }
    if (this.checks.has(check.name)) {
      throw new InvalidArgumentError(`A check named '${check.name}' is already registered`);
    }
    this.checks.set(check.name, check);
    return this;
  }

  has(name: string): boolean {
    return this.checks.has(name);
  }

  get(name: string): ConformanceCheck | null {
    return this.checks.get(name) ?? null;
  }

  names(): string[] {
    return [...this.checks.keys()];
  }

  list(): ConformanceCheck[] {
    return [...this.checks.values()];
  }

  /** Why `check` does not apply to `subject`, or `null` when it does. */
  skipReason<E>(check: ConformanceCheck, subject: CollectionUnderTest<E>): string | null {
    for (const feature of check.requires ?? []) {
      if (!subject.features.has(feature)) {
        return `requires feature ${feature}`;
      }
    }

    const size = collectionSizeOf(subject.size());
    if (check.absentSizes?.includes(size)) {
      return `not applicable to collection size ${size}`;
    }

    return null;
  }

  /** Checks that apply to `subject`, in registration order. */
  enabledFor<E>(subject: CollectionUnderTest<E>): ConformanceCheck[] {
    return this.list().filter((check) => this.skipReason(check, subject) === null);
  }
}
