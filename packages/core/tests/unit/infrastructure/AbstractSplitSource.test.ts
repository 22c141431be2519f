import { describe, it, expect } from 'vitest';
import { AbstractSplitSource } from '../../../src/infrastructure/sources/AbstractSplitSource.js';
import { Characteristic } from '../../../src/domain/model/Characteristic.js';
import type { CharacteristicSet } from '../../../src/domain/model/Characteristic.js';
import type { Visitor } from '../../../src/domain/ports/SplitSource.js';
import { IllegalStateError, InvalidArgumentError } from '../../../src/domain/errors/SplitSourceError.js';

/** Unsized, unsplittable source over an iterator, as a producer might write one. */
class IteratorSource<E> extends AbstractSplitSource<E> {
  private readonly iterator: Iterator<E>;
  private exhausted = false;

  constructor(iterable: Iterable<E>) {
    super();
    this.iterator = iterable[Symbol.iterator]();
  }

  tryAdvance(visit: Visitor<E>): boolean {
    if (this.exhausted) return false;
    const next = this.iterator.next();
    if (next.done === true) {
      this.exhausted = true;
      return false;
    }
    visit(next.value);
    return true;
  }

  trySplit(): null {
    return null;
  }

  estimateSize(): number {
    return this.exhausted ? 0 : Number.POSITIVE_INFINITY;
  }

  characteristics(): CharacteristicSet {
    return Characteristic.ORDERED;
  }
}

describe('AbstractSplitSource', () => {
  it('should derive forEachRemaining from tryAdvance', () => {
    const source = new IteratorSource(new Set(['a', 'b', 'c']));
    const visited: string[] = [];

    source.tryAdvance((element) => visited.push(`first:${element}`));
    source.forEachRemaining((element) => visited.push(element));

    expect(visited).toEqual(['first:a', 'b', 'c']);
  });

  it('should validate the visit function in forEachRemaining', () => {
    const source = new IteratorSource([1]);

    expect(() => Reflect.apply(source.forEachRemaining, source, [42])).toThrow(
      'Expected a visit function, got number',
    );
    expect(() => Reflect.apply(source.forEachRemaining, source, [42])).toThrow(InvalidArgumentError);
  });

  it('should report -1 as exact size when SIZED is not declared', () => {
    expect(new IteratorSource([1, 2]).exactSizeIfKnown()).toBe(-1);
  });

  it('should answer hasCharacteristics from characteristics()', () => {
    const source = new IteratorSource([1, 2]);

    expect(source.hasCharacteristics(Characteristic.ORDERED)).toBe(true);
    expect(source.hasCharacteristics(Characteristic.ORDERED | Characteristic.SIZED)).toBe(false);
  });

  it('should reject comparator() naming the concrete class', () => {
    const source = new IteratorSource([1, 2]);

    expect(() => source.comparator()).toThrow(IllegalStateError);
    expect(() => source.comparator()).toThrow('IteratorSource: comparator() requires the SORTED characteristic');
  });
});
