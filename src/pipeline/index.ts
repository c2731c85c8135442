export { runBatch, isCleanRun } from './run.js';
export type { BatchDeps, RunSummary } from './run.js';
