import { describe, it, expect } from 'vitest';
import { Characteristic, InvalidArgumentError, collect, formatCharacteristics } from '@splitsource/core';
import { ArrayListCollection } from '../../../src/infrastructure/collections/ArrayListCollection.js';
import { ImmutableListCollection } from '../../../src/infrastructure/collections/ImmutableListCollection.js';
import { SortedSetCollection } from '../../../src/infrastructure/collections/SortedSetCollection.js';
import { SingletonCollection } from '../../../src/infrastructure/collections/SingletonCollection.js';
import { CustomCollection } from '../../../src/infrastructure/collections/CustomCollection.js';
import { CollectionFeature } from '../../../src/domain/model/CollectionFeature.js';

describe('ArrayListCollection', () => {
  it('should declare nulls, add and remove', () => {
    const list = new ArrayListCollection<number>('list');

    expect([...list.features]).toEqual([
      CollectionFeature.ALLOWS_NULL_VALUES,
      CollectionFeature.SUPPORTS_ADD,
      CollectionFeature.SUPPORTS_REMOVE,
    ]);
  });

  it('should hand out ordered snapshots of the current contents', () => {
    const list = new ArrayListCollection('list', [1, 2]);
    const before = list.splitSource();

    list.add(3);

    expect(collect('BULK_DRAIN', before)).toEqual([1, 2]);
    expect(collect('BULK_DRAIN', list.splitSource())).toEqual([1, 2, 3]);
    expect(formatCharacteristics(list.splitSource().characteristics())).toBe('ORDERED | SIZED | SUBSIZED');
  });

  it('should remove the first occurrence only', () => {
    const list = new ArrayListCollection('list', [1, Number.NaN, 2, 1]);

    expect(list.remove(1)).toBe(true);
    expect(list.remove(Number.NaN)).toBe(true);
    expect(list.remove(7)).toBe(false);
    expect(list.orderedElements()).toEqual([2, 1]);
    expect(list.size()).toBe(2);
  });
});

describe('ImmutableListCollection', () => {
  it('should declare IMMUTABLE and NONNULL and no features', () => {
    const fixed = new ImmutableListCollection('fixed', ['a', 'b']);

    expect(fixed.features.size).toBe(0);
    expect(formatCharacteristics(fixed.splitSource().characteristics())).toBe(
      'ORDERED | SIZED | NONNULL | IMMUTABLE | SUBSIZED',
    );
    expect(fixed.sampleElements()).toEqual(['a', 'b']);
  });

  it('should reject null elements', () => {
    expect(() => new ImmutableListCollection('fixed', ['a', null])).toThrow(InvalidArgumentError);
    expect(() => new ImmutableListCollection('fixed', ['a', null])).toThrow(
      'fixed does not accept null elements (found one at index 1)',
    );
  });
});

describe('SortedSetCollection', () => {
  it('should keep elements sorted and distinct', () => {
    const words = new SortedSetCollection('words', ['pear', 'apple', 'fig', 'apple']);

    expect(words.orderedElements()).toEqual(['apple', 'fig', 'pear']);
    expect(words.add('banana')).toBe(true);
    expect(words.add('fig')).toBe(false);
    expect(words.remove('fig')).toBe(true);
    expect(words.remove('kiwi')).toBe(false);
    expect(collect('MAXIMUM_SPLIT', words.splitSource())).toEqual(['apple', 'banana', 'pear']);
  });

  it('should report a null comparator under natural ordering', () => {
    const source = new SortedSetCollection('numbers', [2, 1]).splitSource();

    expect(source.hasCharacteristics(Characteristic.SORTED | Characteristic.DISTINCT | Characteristic.NONNULL)).toBe(
      true,
    );
    expect(source.comparator()).toBeNull();
  });

  it('should order by and report a supplied comparator', () => {
    const descending = (a: number, b: number): number => b - a;
    const numbers = new SortedSetCollection('numbers', [1, 3, 2, 3], descending);

    expect(numbers.orderedElements()).toEqual([3, 2, 1]);
    expect(numbers.splitSource().comparator()).toBe(descending);
  });

  it('should reject null elements', () => {
    const words = new SortedSetCollection<string | null>('words');

    expect(() => words.add(null)).toThrow('words does not accept null elements');
  });
});

describe('SingletonCollection', () => {
  it('should hold one element, which may be null', () => {
    const single = new SingletonCollection('single', null);

    expect(single.size()).toBe(1);
    expect(single.features.has(CollectionFeature.ALLOWS_NULL_VALUES)).toBe(true);
    expect(collect('STEP_ADVANCE', single.splitSource())).toEqual([null]);
  });
});

describe('CustomCollection', () => {
  it('should call the factory for every source and honour an explicit size', () => {
    let created = 0;
    const custom = new CustomCollection({
      name: 'custom',
      elements: [1, 2],
      size: 5,
      features: [CollectionFeature.SUPPORTS_ADD],
      splitSource: () => {
        created++;
        return new ArrayListCollection('inner', [1, 2]).splitSource();
      },
    });

    custom.splitSource();
    custom.splitSource();

    expect(created).toBe(2);
    expect(custom.size()).toBe(5);
    expect(custom.features.has(CollectionFeature.SUPPORTS_ADD)).toBe(true);
    expect(custom.orderedElements()).toEqual([1, 2]);
  });
});
