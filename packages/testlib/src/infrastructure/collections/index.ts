export { ArrayListCollection } from './ArrayListCollection.js';
export { ImmutableListCollection } from './ImmutableListCollection.js';
export { SortedSetCollection } from './SortedSetCollection.js';
export { SingletonCollection } from './SingletonCollection.js';
export { CustomCollection } from './CustomCollection.js';
export type { CustomCollectionOptions } from './CustomCollection.js';
