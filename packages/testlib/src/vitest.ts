export { describeConformance, conformanceTests } from './infrastructure/vitest/describeConformance.js';
export type { ConformanceTest } from './infrastructure/vitest/describeConformance.js';
