/** Size buckets used to gate checks that make no sense for some sizes. */
export const CollectionSize = {
  ZERO: 'ZERO',
  ONE: 'ONE',
  SEVERAL: 'SEVERAL',
} as const;

export type CollectionSize = (typeof CollectionSize)[keyof typeof CollectionSize];

/** Bucket an exact element count. */
export function collectionSizeOf(count: number): CollectionSize {
  if (count === 0) return CollectionSize.ZERO;
  if (count === 1) return CollectionSize.ONE;
  return CollectionSize.SEVERAL;
}
