/** Capabilities a collection under test declares. Checks are gated on them. */
export const CollectionFeature = {
  /** The collection accepts `null` (or `undefined`) elements. */
  ALLOWS_NULL_VALUES: 'ALLOWS_NULL_VALUES',
  /** Elements can be added after construction. */
  SUPPORTS_ADD: 'SUPPORTS_ADD',
  /** Elements can be removed after construction. */
  SUPPORTS_REMOVE: 'SUPPORTS_REMOVE',
} as const;

export type CollectionFeature = (typeof CollectionFeature)[keyof typeof CollectionFeature];
