/**
 * Problem size limits.
 *
 * The search keeps one index set per core and builds every fiber as an
 * array of multi-indices, so memory grows with rank, mode count and mode
 * size. Anything accepted from a request or the environment is checked
 * against these limits before an optimizer is constructed.
 */
import { GridSpec } from './types';

export const MAX_DIMENSION = 2048;
export const MAX_TENSOR_MODES = 2048;
export const MAX_GRID_POINTS = 2 ** 20;
export const MAX_RANK = 64;
export const MAX_SEED = 2 ** 32 - 1;
export const MAX_SEARCH_CELLS = 2 ** 25;

export interface ProblemShape {
  dimension: number;
  rank: number;
  grid: GridSpec;
}

function largest(size: number | number[]): number {
  return typeof size === 'number' ? size : Math.max(...size);
}

/**
 * First size limit the shape breaks, or null when it fits.
 */
export function problemSizeIssue({ dimension, rank, grid }: ProblemShape): string | null {
  const modes = grid.kind === 'qtt' ? dimension * grid.exponent : dimension;
  if (modes > MAX_TENSOR_MODES) {
    return `tensor has ${modes} modes, at most ${MAX_TENSOR_MODES} allowed`;
  }

  const points = grid.kind === 'qtt' ? grid.factor ** grid.exponent : largest(grid.size);
  if (points > MAX_GRID_POINTS) {
    return `grid has ${points} points per dimension, at most ${MAX_GRID_POINTS} allowed`;
  }

  // index sets (rank x modes entries per core) plus the widest fiber
  const modeSize = grid.kind === 'qtt' ? grid.factor : points;
  const cells = rank * modes * (rank * modeSize + modes);
  if (cells > MAX_SEARCH_CELLS) {
    return `search state of ${cells} index entries exceeds ${MAX_SEARCH_CELLS}; lower rank, dimension or grid size`;
  }

  return null;
}
