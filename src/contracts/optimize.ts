/**
 * Optimize Request Contracts
 *
 * Request bodies may override any of the configured optimizer defaults.
 * Field-level rules live in the zod schema; rules that relate fields to each
 * other (bounds order, vector lengths, grid mode, problem size) are checked
 * when the overrides are merged with the defaults.
 */
import { z } from 'zod';
import { OptimizerDefaults } from '../config';
import { ObjectiveDefinition, getObjective, listObjectives } from '../objectives';
import {
  MAX_DIMENSION,
  MAX_GRID_POINTS,
  MAX_RANK,
  MAX_SEED,
  problemSizeIssue,
} from '../optimizer/limits';
import { GridSpec, OptimizerSettings } from '../optimizer/types';
import { ValidationError } from '../utils/errors';

const finite = z.number().finite();
const vector = (item: z.ZodNumber) => z.array(item).nonempty().max(MAX_DIMENSION);
const bound = z.union([finite, vector(finite)]);
const gridPoints = z.number().int().min(2).max(MAX_GRID_POINTS);

export const OptimizeRequestSchema = z.object({
  objective: z.string().min(1).optional(),
  name: z.string().max(64).optional(),
  dimension: z.number().int().positive().max(MAX_DIMENSION).optional(),
  lower_bound: bound.optional(),
  upper_bound: bound.optional(),
  grid_size: z.union([gridPoints, vector(gridPoints)]).optional(),
  grid_factor: gridPoints.optional(),
  grid_exponent: z.number().int().positive().max(Math.log2(MAX_GRID_POINTS)).optional(),
  evaluations: finite.positive().optional(),
  rank: z.number().int().positive().max(MAX_RANK).optional(),
  seed: z.number().int().nonnegative().max(MAX_SEED).optional(),
  x_opt_real: z.array(finite).max(MAX_DIMENSION).optional(),
  y_opt_real: finite.optional(),
  with_log: z.boolean().optional(),
  with_cache: z.boolean().optional(),
});

export type OptimizeRequest = z.infer<typeof OptimizeRequestSchema>;

/**
 * Fully resolved, immutable configuration for one run.
 */
export interface OptimizationConfig {
  objective: ObjectiveDefinition;
  rank: number;
  settings: Readonly<OptimizerSettings>;
}

/**
 * Response body of POST /optimize
 */
export interface OptimizeResponse {
  minimum_value: string;
}

function checkBound(
  value: number | number[],
  dimension: number,
  field: string,
  problems: string[],
): void {
  if (Array.isArray(value) && value.length !== dimension) {
    problems.push(`${field} has ${value.length} entries, expected ${dimension}`);
  }
}

function boundAt(value: number | number[], j: number): number {
  return typeof value === 'number' ? value : value[j];
}

function resolveGrid(request: OptimizeRequest, defaults: OptimizerDefaults, problems: string[]): GridSpec {
  const wantsQtt = request.grid_factor !== undefined || request.grid_exponent !== undefined;

  if (request.grid_size !== undefined) {
    if (wantsQtt) {
      problems.push('grid_size cannot be combined with grid_factor or grid_exponent');
    }
    return { kind: 'uniform', size: request.grid_size };
  }

  return {
    kind: 'qtt',
    factor: request.grid_factor ?? defaults.gridFactor,
    exponent: request.grid_exponent ?? defaults.gridExponent,
  };
}

/**
 * Merge a request body over the defaults. Throws ValidationError listing
 * every problem found.
 */
export function resolveOptimizationConfig(
  body: unknown,
  defaults: OptimizerDefaults,
): OptimizationConfig {
  const parsed = OptimizeRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid optimization request',
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  const request = parsed.data;
  const problems: string[] = [];

  const objectiveId = request.objective ?? defaults.objective;
  const objective = getObjective(objectiveId);
  if (!objective) {
    const known = listObjectives().map((o) => o.id).join(', ');
    throw new ValidationError(`Unknown objective "${objectiveId}"; expected one of ${known}`);
  }

  const dimension = request.dimension ?? defaults.dimension;
  const lowerBound = request.lower_bound ?? defaults.lowerBound;
  const upperBound = request.upper_bound ?? defaults.upperBound;

  checkBound(lowerBound, dimension, 'lower_bound', problems);
  checkBound(upperBound, dimension, 'upper_bound', problems);
  if (problems.length === 0) {
    for (let j = 0; j < dimension; j++) {
      if (!(boundAt(lowerBound, j) < boundAt(upperBound, j))) {
        problems.push(`lower_bound must be below upper_bound (dimension ${j})`);
        break;
      }
    }
  }

  if (Array.isArray(request.grid_size) && request.grid_size.length !== dimension) {
    problems.push(`grid_size has ${request.grid_size.length} entries, expected ${dimension}`);
  }
  const grid = resolveGrid(request, defaults, problems);
  const rank = request.rank ?? defaults.rank;

  const sizeIssue = problemSizeIssue({ dimension, rank, grid });
  if (sizeIssue) {
    problems.push(sizeIssue);
  }

  const usesDefaultObjective = request.objective === undefined || request.objective === defaults.objective;
  const xOptReal =
    request.x_opt_real ??
    (usesDefaultObjective ? new Array<number>(dimension).fill(defaults.xOptReal) : objective.minimizer(dimension));
  if (xOptReal.length !== dimension) {
    problems.push(`x_opt_real has ${xOptReal.length} entries, expected ${dimension}`);
  }

  if (problems.length > 0) {
    throw new ValidationError('Invalid optimization request', problems);
  }

  return Object.freeze({
    objective,
    rank,
    settings: Object.freeze({
      dimension,
      lowerBound,
      upperBound,
      grid,
      evaluations: request.evaluations ?? defaults.evaluations,
      seed: request.seed ?? defaults.seed,
      name: request.name ?? (usesDefaultObjective ? defaults.name : objective.label),
      xOptReal,
      yOptReal: request.y_opt_real ?? objective.minimum,
      withLog: request.with_log ?? defaults.withLog,
      withCache: request.with_cache ?? defaults.withCache,
    }),
  });
}
