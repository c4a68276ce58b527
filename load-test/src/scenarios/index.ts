export { runPerformanceScenario, strategyFor } from './performance.js';
export type { PerformanceRunOptions } from './performance.js';
