/**
 * Objective Registry
 *
 * Batched test functions the service can minimize. Every objective is pure:
 * a samples x d batch of points in, one value per sample out.
 */
import { BatchObjective } from '../optimizer/types';

export interface ObjectiveDefinition {
  id: string;
  /** Name used in optimizer reports */
  label: string;
  description: string;
  evaluate: BatchObjective;
  /** Known minimizer for a given dimension */
  minimizer(dimension: number): number[];
  minimum: number;
}

function sumBy(point: readonly number[], term: (x: number) => number): number {
  let total = 0;
  for (const x of point) {
    total += term(x);
  }
  return total;
}

/**
 * Alpine N.1: sum_j |x_j sin(x_j) + 0.1 x_j|, minimum 0 at the origin.
 */
export const alpine: BatchObjective = (points) =>
  points.map((point) => sumBy(point, (x) => Math.abs(x * Math.sin(x) + 0.1 * x)));

export const sphere: BatchObjective = (points) =>
  points.map((point) => sumBy(point, (x) => x * x));

export const rastrigin: BatchObjective = (points) =>
  points.map(
    (point) => 10 * point.length + sumBy(point, (x) => x * x - 10 * Math.cos(2 * Math.PI * x)),
  );

const origin = (dimension: number): number[] => new Array<number>(dimension).fill(0);

const registry: ReadonlyMap<string, ObjectiveDefinition> = new Map(
  [
    {
      id: 'alpine',
      label: 'Alpine',
      description: 'Alpine N.1, sum of |x sin(x) + 0.1 x|',
      evaluate: alpine,
      minimizer: origin,
      minimum: 0,
    },
    {
      id: 'sphere',
      label: 'Sphere',
      description: 'Sum of squares',
      evaluate: sphere,
      minimizer: origin,
      minimum: 0,
    },
    {
      id: 'rastrigin',
      label: 'Rastrigin',
      description: 'Rastrigin, 10 d + sum of x^2 - 10 cos(2 pi x)',
      evaluate: rastrigin,
      minimizer: origin,
      minimum: 0,
    },
  ].map((definition): [string, ObjectiveDefinition] => [definition.id, definition]),
);

export function getObjective(id: string): ObjectiveDefinition | undefined {
  return registry.get(id);
}

export function listObjectives(): ObjectiveDefinition[] {
  return [...registry.values()];
}

/**
 * Wrap an objective so every call checks the batch width against `dimension`.
 */
export function withDimensionCheck(objective: BatchObjective, dimension: number): BatchObjective {
  return (points) => {
    for (const point of points) {
      if (point.length !== dimension) {
        throw new RangeError(`objective expects ${dimension} coordinates, got ${point.length}`);
      }
    }
    return objective(points);
  };
}
