import { Characteristic } from '../../domain/model/Characteristic.js';
import type { CharacteristicSet } from '../../domain/model/Characteristic.js';
import type { Comparator } from '../../domain/model/Comparator.js';
import { IllegalStateError, InvalidArgumentError } from '../../domain/errors/SplitSourceError.js';
import type { Visitor } from '../../domain/ports/SplitSource.js';
import { requireCount, requireVisitor } from '../../domain/services/preconditions.js';
import { AbstractSplitSource } from './AbstractSplitSource.js';

/** Maps a position in `[0, length)` to the element stored there. */
export type IndexFunction<E> = (index: number) => E;

export interface IndexedSourceOptions<E> {
  /** Flags declared on top of `SIZED` and `SUBSIZED`, which are always present. Default: none. */
  readonly characteristics?: CharacteristicSet;
  /** Ordering reported by `comparator()` when `SORTED` is declared. `null` means natural ordering. Default: `null`. */
  readonly comparator?: Comparator<E> | null;
  /** First index to visit. Default: `0`. */
  readonly offset?: number;
}

/**
 * Source over the index range `[offset, length)`, reading each element
 * through an index function. Splits by halving the remaining range, so
 * repeated splitting builds a balanced tree whose leaves, read left to right,
 * cover the original range exactly once.
 *
 * The index function must be safe to call from whichever worker ends up
 * owning a split-off range.
 */
export class IndexedSource<E> extends AbstractSplitSource<E> {
  private offset: number;
  private readonly length: number;
  private readonly indexFunction: IndexFunction<E>;
  private readonly order: Comparator<E> | null;
  private readonly flags: CharacteristicSet;

  constructor(length: number, indexFunction: IndexFunction<E>, options: IndexedSourceOptions<E> = {}) {
    super();
    requireCount('IndexedSource: length', length);
    const offset = options.offset ?? 0;
    if (!Number.isSafeInteger(offset) || offset < 0 || offset > length) {
      throw new InvalidArgumentError(
        `IndexedSource: offset must be an integer in [0, ${String(length)}], got ${String(offset)}`,
      );
    }
    if (typeof indexFunction !== 'function') {
      throw new InvalidArgumentError('IndexedSource: indexFunction must be a function');
    }

    this.offset = offset;
    this.length = length;
    this.indexFunction = indexFunction;
    this.order = options.comparator ?? null;
    this.flags = (options.characteristics ?? 0) | Characteristic.SIZED | Characteristic.SUBSIZED;
  }

  tryAdvance(visit: Visitor<E>): boolean {
    requireVisitor(visit);
    if (this.offset >= this.length) {
      return false;
    }
    try {
      visit(this.indexFunction(this.offset));
    } finally {
      this.offset++;
    }
    return true;
  }

  override forEachRemaining(visit: Visitor<E>): void {
    requireVisitor(visit);
    while (this.offset < this.length) {
      try {
        visit(this.indexFunction(this.offset));
      } finally {
        this.offset++;
      }
    }
  }

  trySplit(): IndexedSource<E> | null {
    const mid = this.offset + Math.floor((this.length - this.offset) / 2);
    if (this.offset >= mid) {
      return null;
    }
    const prefix = new IndexedSource(mid, this.indexFunction, {
      characteristics: this.flags,
      comparator: this.order,
      offset: this.offset,
    });
    this.offset = mid;
    return prefix;
  }

  estimateSize(): number {
    return this.length - this.offset;
  }

  characteristics(): CharacteristicSet {
    return this.flags;
  }

  override comparator(): Comparator<E> | null {
    if ((this.flags & Characteristic.SORTED) === 0) {
      throw new IllegalStateError('IndexedSource: comparator() requires the SORTED characteristic');
    }
    return this.order;
  }

  toString(): string {
    return `IndexedSource[${String(this.offset)}, ${String(this.length)})`;
  }
}
