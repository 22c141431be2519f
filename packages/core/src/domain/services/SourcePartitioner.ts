import { InvalidArgumentError } from '../errors/SplitSourceError.js';
import type { SplitSource } from '../ports/SplitSource.js';

/**
 * Domain service that cuts a source into leaf sources for batched or
 * parallel consumption.
 *
 * Pure logic: it only calls `trySplit()` and `estimateSize()`, never visits
 * an element. Leaves come back left to right and own disjoint ranges, so each
 * can be given to a separate worker. By default every leaf holds at most one
 * element and splitting stops 64 levels down.
 */
export class SourcePartitioner {
  constructor(
    private readonly maxLeafSize = 1,
    private readonly maxDepth = 64,
  ) {
    if (!Number.isSafeInteger(maxLeafSize) || maxLeafSize < 1) {
      throw new InvalidArgumentError('Leaf size must be at least 1');
    }
    if (!Number.isSafeInteger(maxDepth) || maxDepth < 0) {
      throw new InvalidArgumentError('Split depth must be a non-negative integer');
    }
  }

  /**
   * Split `source` while its estimate exceeds the leaf size, the depth limit
   * has not been reached and `trySplit()` still succeeds.
   *
   * `source` itself becomes the last leaf.
   */
  partition<E>(source: SplitSource<E>): SplitSource<E>[] {
    const leaves: SplitSource<E>[] = [];
    this.collectLeaves(source, 0, leaves);
    return leaves;
  }

  private collectLeaves<E>(source: SplitSource<E>, depth: number, leaves: SplitSource<E>[]): void {
    // Each split moves both the prefix and the shrunk remainder one level down.
    let level = depth;
    while (level < this.maxDepth && source.estimateSize() > this.maxLeafSize) {
      const prefix = source.trySplit();
      if (prefix === null) break;
      level++;
      this.collectLeaves(prefix, level, leaves);
    }
    leaves.push(source);
  }
}
