import { Characteristic, hasAll } from '../../domain/model/Characteristic.js';
import type { CharacteristicSet } from '../../domain/model/Characteristic.js';
import type { Comparator } from '../../domain/model/Comparator.js';
import { IllegalStateError } from '../../domain/errors/SplitSourceError.js';
import type { SplitSource, Visitor } from '../../domain/ports/SplitSource.js';
import { requireVisitor } from '../../domain/services/preconditions.js';

/**
 * Base for producer-defined sources. Subclasses supply `tryAdvance`,
 * `trySplit`, `estimateSize` and `characteristics`; the rest is derived.
 *
 * `SORTED` subclasses must override `comparator()`.
 */
export abstract class AbstractSplitSource<E> implements SplitSource<E> {
  abstract tryAdvance(visit: Visitor<E>): boolean;
  abstract trySplit(): SplitSource<E> | null;
  abstract estimateSize(): number;
  abstract characteristics(): CharacteristicSet;

  forEachRemaining(visit: Visitor<E>): void {
    requireVisitor(visit);
    while (this.tryAdvance(visit)) {
      // one element per call
    }
  }

  hasCharacteristics(flags: CharacteristicSet): boolean {
    return hasAll(this.characteristics(), flags);
  }

  exactSizeIfKnown(): number {
    return this.hasCharacteristics(Characteristic.SIZED) ? this.estimateSize() : -1;
  }

  comparator(): Comparator<E> | null {
    throw new IllegalStateError(`${this.constructor.name}: comparator() requires the SORTED characteristic`);
  }
}
