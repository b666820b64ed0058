/**
 * TT Optimizer Index
 */
export { TTOptimizer } from './tt-optimizer';
export type { AsyncRunOptions } from './tt-optimizer';
export { TTCrossSearch, boundedRanks, emphasizeMinimum } from './tt-cross';
export { Grid } from './grid';
export { Matrix, qr, maxvol, inverse } from './linalg';
export * from './types';
