/**
 * Optimization Jobs Index
 */
export { JobRunner } from './job-runner';
export type { RunFunction } from './job-runner';
export * from './types';
