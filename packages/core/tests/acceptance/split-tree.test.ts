import { describe, it, expect } from 'vitest';
import { IndexedSource } from '../../src/infrastructure/sources/IndexedSource.js';
import { SourcePartitioner } from '../../src/domain/services/SourcePartitioner.js';
import { ALL_STRATEGIES, collect } from '../../src/domain/services/DecompositionStrategy.js';
import type { SplitSource } from '../../src/domain/ports/SplitSource.js';

// --- Helpers ---

/** Split to exhaustion and return the depth of the deepest leaf. */
function deepestLeaf<E>(source: SplitSource<E>, depth = 0): number {
  let level = depth;
  let deepest = depth;
  for (let prefix = source.trySplit(); prefix !== null; prefix = source.trySplit()) {
    level++;
    deepest = Math.max(deepest, deepestLeaf(prefix, level));
  }
  return Math.max(deepest, level);
}

/** Split to exhaustion and return every leaf, left to right. */
function leavesOf<E>(source: SplitSource<E>): SplitSource<E>[] {
  const leaves: SplitSource<E>[] = [];
  for (let prefix = source.trySplit(); prefix !== null; prefix = source.trySplit()) {
    leaves.push(...leavesOf(prefix));
  }
  leaves.push(source);
  return leaves;
}

function drain<E>(source: SplitSource<E>): E[] {
  const visited: E[] = [];
  source.forEachRemaining((element) => visited.push(element));
  return visited;
}

const identity = (index: number) => index;

// ============================================================
// Squares over [0, 5)
// ============================================================
describe('Squares over [0, 5)', () => {
  const squares = () => new IndexedSource(5, (i) => i * i);

  it('should yield {0, 1, 4, 9, 16} under every strategy', () => {
    for (const strategy of ALL_STRATEGIES) {
      expect(collect(strategy, squares())).toEqual([0, 1, 4, 9, 16]);
    }
  });

  it('should split into prefix {0, 1} and a remainder that splits into {4} and {9, 16}', () => {
    const remainder = squares();
    const prefix = remainder.trySplit();
    const middle = remainder.trySplit();

    expect(prefix ? drain(prefix) : null).toEqual([0, 1]);
    expect(middle ? drain(middle) : null).toEqual([4]);
    expect(drain(remainder)).toEqual([9, 16]);
  });
});

// ============================================================
// Split tree shape
// ============================================================
describe('Split tree shape', () => {
  const lengths = [1, 2, 3, 5, 8, 13, 64, 100, 1000];

  it.each(lengths)('should reach leaves within ceil(log2 n) levels for n = %i', (n) => {
    expect(deepestLeaf(new IndexedSource(n, identity))).toBeLessThanOrEqual(Math.ceil(Math.log2(n)));
  });

  it.each(lengths)('should produce n single-element leaves with no overlap for n = %i', (n) => {
    const leaves = leavesOf(new IndexedSource(n, identity));
    const visited = leaves.flatMap((leaf) => drain(leaf));

    expect(leaves).toHaveLength(n);
    expect(visited).toEqual(Array.from({ length: n }, (_, i) => i));
    expect(new Set(visited).size).toBe(n);
  });

  it('should never split an empty range', () => {
    expect(leavesOf(new IndexedSource(0, identity))).toHaveLength(1);
  });
});

// ============================================================
// Independent consumption of split-off sources
// ============================================================
describe('Independent consumption', () => {
  it('should let workers drain leaves concurrently without coordination', async () => {
    const leaves = new SourcePartitioner(16).partition(new IndexedSource(200, identity));
    const visited: number[] = [];

    await Promise.all(
      leaves.map(async (leaf) => {
        while (leaf.tryAdvance((element) => visited.push(element))) {
          await Promise.resolve();
        }
      }),
    );

    expect(visited).toHaveLength(200);
    expect([...visited].sort((a, b) => a - b)).toEqual(Array.from({ length: 200 }, (_, i) => i));
  });

  it('should resume where a consumer stopped early', () => {
    const source = new IndexedSource(6, identity);
    const firstPass: number[] = [];

    source.tryAdvance((element) => firstPass.push(element));
    source.tryAdvance((element) => firstPass.push(element));
    const prefix = source.trySplit();

    expect(firstPass).toEqual([0, 1]);
    expect(prefix ? drain(prefix) : null).toEqual([2, 3]);
    expect(drain(source)).toEqual([4, 5]);
  });

  it('should keep the parent intact when a split-off prefix is abandoned', () => {
    const source = new IndexedSource(10, identity);
    const abandoned = source.trySplit();

    expect(abandoned?.estimateSize()).toBe(5);
    expect(drain(source)).toEqual([5, 6, 7, 8, 9]);
  });
});
