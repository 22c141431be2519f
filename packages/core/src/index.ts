// Characteristics
export {
  Characteristic,
  NO_CHARACTERISTICS,
  characteristicsOf,
  hasAll,
  describeCharacteristics,
  formatCharacteristics,
} from './domain/model/Characteristic.js';
export type { CharacteristicSet } from './domain/model/Characteristic.js';

// Ordering
export type { Comparator } from './domain/model/Comparator.js';
export { naturalOrder, isOrdered } from './domain/model/Comparator.js';

// Errors
export { SplitSourceError, InvalidArgumentError, IllegalStateError } from './domain/errors/SplitSourceError.js';
export type { SplitSourceErrorCode } from './domain/errors/SplitSourceError.js';

// Ports (for producer-defined sources)
export type { SplitSource, Visitor } from './domain/ports/SplitSource.js';

// Domain services
export {
  DecompositionStrategy,
  ALL_STRATEGIES,
  decompose,
  collect,
  isDecompositionStrategy,
} from './domain/services/DecompositionStrategy.js';
export { SourcePartitioner } from './domain/services/SourcePartitioner.js';

// Built-in sources
export { AbstractSplitSource } from './infrastructure/sources/AbstractSplitSource.js';
export { SingletonSource } from './infrastructure/sources/SingletonSource.js';
export { IndexedSource } from './infrastructure/sources/IndexedSource.js';
export type { IndexFunction, IndexedSourceOptions } from './infrastructure/sources/IndexedSource.js';
export { Sources, singleton, range, fromArray, empty } from './Sources.js';
