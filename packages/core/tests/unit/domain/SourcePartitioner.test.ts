import { describe, it, expect } from 'vitest';
import { SourcePartitioner } from '../../../src/domain/services/SourcePartitioner.js';
import { IndexedSource } from '../../../src/infrastructure/sources/IndexedSource.js';
import { SingletonSource } from '../../../src/infrastructure/sources/SingletonSource.js';
import type { SplitSource } from '../../../src/domain/ports/SplitSource.js';

const identity = (index: number) => index;

function drain<E>(source: SplitSource<E>): E[] {
  const visited: E[] = [];
  source.forEachRemaining((element) => visited.push(element));
  return visited;
}

describe('SourcePartitioner', () => {
  describe('constructor', () => {
    it('should throw when leaf size is less than 1', () => {
      expect(() => new SourcePartitioner(0)).toThrow('Leaf size must be at least 1');
      expect(() => new SourcePartitioner(-5)).toThrow('Leaf size must be at least 1');
    });

    it('should throw when depth is negative', () => {
      expect(() => new SourcePartitioner(1, -1)).toThrow('Split depth must be a non-negative integer');
    });

    it('should accept leaf size of 1', () => {
      expect(() => new SourcePartitioner(1)).not.toThrow();
    });
  });

  describe('partition', () => {
    it('should split until every leaf fits the leaf size', () => {
      const leaves = new SourcePartitioner(3).partition(new IndexedSource(10, identity));

      expect(leaves.map((leaf) => leaf.estimateSize())).toEqual([2, 3, 2, 3]);
    });

    it('should return leaves left to right covering the source exactly once', () => {
      const leaves = new SourcePartitioner(3).partition(new IndexedSource(10, identity));

      expect(leaves.flatMap((leaf) => drain(leaf))).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('should let leaves be drained in any order without overlap', () => {
      const leaves = new SourcePartitioner(2).partition(new IndexedSource(7, identity));
      const visited = [...leaves].reverse().flatMap((leaf) => drain(leaf));

      expect([...visited].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6]);
    });

    it('should produce one leaf per element with leaf size 1', () => {
      const leaves = new SourcePartitioner(1).partition(new IndexedSource(6, identity));

      expect(leaves).toHaveLength(6);
      leaves.forEach((leaf) => {
        expect(leaf.estimateSize()).toBe(1);
      });
    });

    it('should default to leaves of one element', () => {
      const leaves = new SourcePartitioner().partition(new IndexedSource(5, identity));

      expect(leaves.map((leaf) => leaf.estimateSize())).toEqual([1, 1, 1, 1, 1]);
      expect(leaves.flatMap((leaf) => drain(leaf))).toEqual([0, 1, 2, 3, 4]);
    });

    it('should stop at the depth limit', () => {
      const leaves = new SourcePartitioner(1, 1).partition(new IndexedSource(10, identity));

      expect(leaves.map((leaf) => leaf.estimateSize())).toEqual([5, 5]);
    });

    it('should return the source itself when depth limit is 0', () => {
      const source = new IndexedSource(10, identity);

      expect(new SourcePartitioner(1, 0).partition(source)).toEqual([source]);
    });

    it('should return the source itself when it cannot split', () => {
      const source = new SingletonSource('x');

      expect(new SourcePartitioner(1).partition(source)).toEqual([source]);
    });

    it('should return a single leaf when the source already fits', () => {
      const source = new IndexedSource(4, identity);
      const leaves = new SourcePartitioner(10).partition(source);

      expect(leaves).toHaveLength(1);
      expect(leaves[0]).toBe(source);
    });

    it('should return the empty source as its only leaf', () => {
      const source = new IndexedSource(0, identity);

      expect(new SourcePartitioner(1).partition(source)).toEqual([source]);
    });
  });
});
