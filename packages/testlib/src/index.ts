// Facade
export { ConformanceHarness } from './ConformanceHarness.js';
export type { ConformanceHarnessConfig } from './ConformanceHarness.js';

// Domain model
export { CollectionFeature } from './domain/model/CollectionFeature.js';
export { CollectionSize, collectionSizeOf } from './domain/model/CollectionSize.js';
export { sameValueZero } from './domain/model/Equivalence.js';
export type { Equivalence } from './domain/model/Equivalence.js';
export { formatFailure } from './domain/model/ConformanceFailure.js';
export type { ConformanceFailure, ConformanceFailureCode } from './domain/model/ConformanceFailure.js';
export { CheckStatus, ConformanceError, assertConformance } from './domain/model/ConformanceReport.js';
export type { CheckOutcome, ConformanceReport } from './domain/model/ConformanceReport.js';

// Ports
export type { CollectionUnderTest } from './domain/ports/CollectionUnderTest.js';
export type { ConformanceCheck, CheckContext } from './domain/ports/ConformanceCheck.js';

// Domain services
export { multisetDiff, firstDifference, formatElements } from './domain/services/ElementMatcher.js';

// Events
export type {
  HarnessEvent,
  EventType,
  EventPayload,
  HarnessStartedEvent,
  CheckStartedEvent,
  CheckPassedEvent,
  CheckFailedEvent,
  CheckSkippedEvent,
  HarnessCompletedEvent,
} from './domain/events/HarnessEvents.js';

// Application
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorListener } from './application/EventBus.js';
export { CheckRegistry } from './application/CheckRegistry.js';
export type { PlannedCheck } from './application/usecases/PlanConformance.js';
export {
  DEFAULT_CHECKS,
  elementsCheck,
  knownOrderCheck,
  comparatorCheck,
  estimateSizeCheck,
  nullableCheck,
  notImmutableWhenAddSupportedCheck,
  notImmutableWhenRemoveSupportedCheck,
} from './application/checks/index.js';

// Sample collections
export {
  ArrayListCollection,
  ImmutableListCollection,
  SortedSetCollection,
  SingletonCollection,
  CustomCollection,
} from './infrastructure/collections/index.js';
export type { CustomCollectionOptions } from './infrastructure/collections/index.js';
