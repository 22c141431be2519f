import type { SplitSource, Visitor } from '../ports/SplitSource.js';
import { requireVisitor } from './preconditions.js';

/**
 * Fixed ways of draining a source. Every conforming source yields the same
 * elements under each of them (in the same order when `ORDERED`).
 */
export const DecompositionStrategy = {
  /** One `forEachRemaining` call on the untouched source. */
  BULK_DRAIN: 'BULK_DRAIN',
  /** `tryAdvance` until it returns `false`. */
  STEP_ADVANCE: 'STEP_ADVANCE',
  /** Split until indivisible, draining each prefix depth-first before the remainder. */
  MAXIMUM_SPLIT: 'MAXIMUM_SPLIT',
} as const;

export type DecompositionStrategy = (typeof DecompositionStrategy)[keyof typeof DecompositionStrategy];

export const ALL_STRATEGIES: readonly DecompositionStrategy[] = [
  DecompositionStrategy.BULK_DRAIN,
  DecompositionStrategy.STEP_ADVANCE,
  DecompositionStrategy.MAXIMUM_SPLIT,
];

type Drain = <E>(source: SplitSource<E>, visit: Visitor<E>) => void;

function maximumSplit<E>(source: SplitSource<E>, visit: Visitor<E>): void {
  for (let prefix = source.trySplit(); prefix !== null; prefix = source.trySplit()) {
    maximumSplit(prefix, visit);
  }
  source.forEachRemaining(visit);
}

const DRAINS: Record<DecompositionStrategy, Drain> = {
  [DecompositionStrategy.BULK_DRAIN]: (source, visit) => {
    source.forEachRemaining(visit);
  },
  [DecompositionStrategy.STEP_ADVANCE]: (source, visit) => {
    while (source.tryAdvance(visit)) {
      // one element per call
    }
  },
  [DecompositionStrategy.MAXIMUM_SPLIT]: maximumSplit,
};

/** Type guard for strategy names arriving from configuration. */
export function isDecompositionStrategy(value: string): value is DecompositionStrategy {
  return Object.prototype.hasOwnProperty.call(DRAINS, value);
}

/** Drain `source` with `strategy`, calling `visit` for every element. */
export function decompose<E>(strategy: DecompositionStrategy, source: SplitSource<E>, visit: Visitor<E>): void {
  requireVisitor(visit);
  DRAINS[strategy](source, visit);
}

/** Drain `source` with `strategy` and return the visited elements in visit order. */
export function collect<E>(strategy: DecompositionStrategy, source: SplitSource<E>): E[] {
  const visited: E[] = [];
  decompose(strategy, source, (element) => {
    visited.push(element);
  });
  return visited;
}
