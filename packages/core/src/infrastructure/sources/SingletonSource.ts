import { Characteristic, characteristicsOf } from '../../domain/model/Characteristic.js';
import type { CharacteristicSet } from '../../domain/model/Characteristic.js';
import type { Visitor } from '../../domain/ports/SplitSource.js';
import { requireVisitor } from '../../domain/services/preconditions.js';
import { AbstractSplitSource } from './AbstractSplitSource.js';

// NONNULL is left out: the element type admits null, and the declared set
// has to hold for every instance, not just this one.
const SINGLETON_CHARACTERISTICS = characteristicsOf(
  Characteristic.DISTINCT,
  Characteristic.IMMUTABLE,
  Characteristic.ORDERED,
  Characteristic.SIZED,
  Characteristic.SUBSIZED,
);

/** Source over exactly one element, which may be `null`. Never splits. */
export class SingletonSource<E> extends AbstractSplitSource<E> {
  // Boxed so a held `null` element stays distinct from "already visited".
  private held: { readonly value: E } | null;

  constructor(value: E) {
    super();
    this.held = { value };
  }

  tryAdvance(visit: Visitor<E>): boolean {
    requireVisitor(visit);
    const held = this.held;
    if (held === null) {
      return false;
    }
    try {
      visit(held.value);
    } finally {
      this.held = null;
    }
    return true;
  }

  override forEachRemaining(visit: Visitor<E>): void {
    this.tryAdvance(visit);
  }

  trySplit(): null {
    return null;
  }

  estimateSize(): number {
    return this.held === null ? 0 : 1;
  }

  characteristics(): CharacteristicSet {
    return SINGLETON_CHARACTERISTICS;
  }
}
