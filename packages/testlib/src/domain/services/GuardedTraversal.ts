import { Characteristic, DecompositionStrategy, collect } from '@splitsource/core';
import type { SplitSource, Visitor } from '@splitsource/core';
import type { ConformanceFailure } from '../model/ConformanceFailure.js';

// Unsized sources give no estimate to compare, so their splits are counted
// instead. Exceeding this many across one traversal counts as a stall.
const MAX_UNSIZED_SPLITS = 1_000_000;

/**
 * Why a split traversal was stopped: a sized parent that did not shrink, or
 * an unsized source that split past the limit.
 */
export interface SplitStall {
  readonly reason: 'NOT_SHRINKING' | 'SPLIT_LIMIT';
  readonly before: number;
  readonly after: number;
  readonly splits: number;
}

/** Elements visited by one strategy, or the split that stopped it. */
export type Traversal<E> =
  | { readonly elements: E[]; readonly stall: null }
  | { readonly elements: null; readonly stall: SplitStall };

interface SplitBudget {
  splits: number;
}

function splitDepthFirst<E>(source: SplitSource<E>, visit: Visitor<E>, budget: SplitBudget): SplitStall | null {
  const sized = source.hasCharacteristics(Characteristic.SIZED);
  for (;;) {
    const before = source.estimateSize();
    const prefix = source.trySplit();
    if (prefix === null) break;
    budget.splits++;

    const after = source.estimateSize();
    if (sized && after >= before) {
      return { reason: 'NOT_SHRINKING', before, after, splits: budget.splits };
    }
    if (!sized && budget.splits > MAX_UNSIZED_SPLITS) {
      return { reason: 'SPLIT_LIMIT', before, after, splits: budget.splits };
    }

    const stall = splitDepthFirst(prefix, visit, budget);
    if (stall !== null) return stall;
  }
  source.forEachRemaining(visit);
  return null;
}

/**
 * Drain `source` with `strategy` like `collect()`, except that a
 * `MAXIMUM_SPLIT` traversal stops at the first split that does not shrink
 * its parent instead of splitting forever.
 */
export function traverse<E>(strategy: DecompositionStrategy, source: SplitSource<E>): Traversal<E> {
  if (strategy !== DecompositionStrategy.MAXIMUM_SPLIT) {
    return { elements: collect(strategy, source), stall: null };
  }

  const elements: E[] = [];
  const stall = splitDepthFirst(
    source,
    (element) => {
      elements.push(element);
    },
    { splits: 0 },
  );
  return stall === null ? { elements, stall: null } : { elements: null, stall };
}

/** Failure reported by `check` for a traversal that stalled under `strategy`. */
export function splitStallFailure(
  check: string,
  strategy: DecompositionStrategy,
  stall: SplitStall,
): ConformanceFailure {
  if (stall.reason === 'SPLIT_LIMIT') {
    return {
      check,
      code: 'SPLIT_NOT_SHRINKING',
      strategy,
      expected: `at most ${String(MAX_UNSIZED_SPLITS)} splits`,
      actual: stall.splits,
      message: `trySplit() kept returning prefixes past ${String(MAX_UNSIZED_SPLITS)} splits`,
    };
  }
  return {
    check,
    code: 'SPLIT_NOT_SHRINKING',
    strategy,
    expected: `< ${String(stall.before)}`,
    actual: stall.after,
    message: `trySplit() returned a prefix but the remainder stayed at ${String(stall.after)} of ${String(stall.before)}`,
  };
}
