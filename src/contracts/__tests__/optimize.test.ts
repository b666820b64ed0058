import { resolveOptimizationConfig } from '../optimize';
import { OptimizerDefaults } from '../../config';
import { ValidationError } from '../../utils/errors';

const defaults: OptimizerDefaults = {
  dimension: 100,
  lowerBound: -10,
  upperBound: 10,
  gridFactor: 2,
  gridExponent: 12,
  evaluations: 100000,
  rank: 4,
  seed: 42,
  objective: 'alpine',
  name: 'Alpine',
  xOptReal: 1,
  withLog: true,
  withCache: false,
};

function validationDetails(body: unknown): unknown {
  try {
    resolveOptimizationConfig(body, defaults);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.details;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('resolveOptimizationConfig', () => {
  it('should reproduce the defaults for an empty body', () => {
    const config = resolveOptimizationConfig({}, defaults);

    expect(config.objective.id).toBe('alpine');
    expect(config.rank).toBe(4);
    expect(config.settings).toMatchObject({
      dimension: 100,
      lowerBound: -10,
      upperBound: 10,
      grid: { kind: 'qtt', factor: 2, exponent: 12 },
      evaluations: 100000,
      seed: 42,
      name: 'Alpine',
      yOptReal: 0,
      withLog: true,
      withCache: false,
    });
    expect(config.settings.xOptReal).toEqual(new Array<number>(100).fill(1));
  });

  it('should treat a missing body as empty', () => {
    expect(resolveOptimizationConfig(undefined, defaults).settings.dimension).toBe(100);
    expect(resolveOptimizationConfig(null, defaults).settings.dimension).toBe(100);
  });

  it('should apply overrides', () => {
    const config = resolveOptimizationConfig(
      { dimension: 5, evaluations: 500, rank: 2, seed: 7, with_cache: true, lower_bound: -1, upper_bound: 3 },
      defaults,
    );

    expect(config.rank).toBe(2);
    expect(config.settings).toMatchObject({
      dimension: 5,
      evaluations: 500,
      seed: 7,
      withCache: true,
      lowerBound: -1,
      upperBound: 3,
    });
    expect(config.settings.xOptReal).toEqual([1, 1, 1, 1, 1]);
  });

  it('should take the known minimizer of a non-default objective', () => {
    const config = resolveOptimizationConfig({ objective: 'sphere', dimension: 3 }, defaults);
    expect(config.settings.xOptReal).toEqual([0, 0, 0]);
  });

  it('should prefer an explicit x_opt_real', () => {
    const config = resolveOptimizationConfig({ dimension: 2, x_opt_real: [0.5, -0.5] }, defaults);
    expect(config.settings.xOptReal).toEqual([0.5, -0.5]);
  });

  it('should switch to a uniform grid when grid_size is given', () => {
    const config = resolveOptimizationConfig({ dimension: 2, grid_size: 11 }, defaults);
    expect(config.settings.grid).toEqual({ kind: 'uniform', size: 11 });
  });

  it('should fill a partial QTT override from the defaults', () => {
    const config = resolveOptimizationConfig({ grid_exponent: 6 }, defaults);
    expect(config.settings.grid).toEqual({ kind: 'qtt', factor: 2, exponent: 6 });
  });

  it('should name runs after a non-default objective', () => {
    const config = resolveOptimizationConfig({ objective: 'sphere', dimension: 3 }, defaults);
    expect(config.settings.name).toBe('Sphere');
  });

  it('should ignore unknown fields', () => {
    const config = resolveOptimizationConfig({ dimension: 3, note: 'hello' }, defaults);
    expect(config.settings.dimension).toBe(3);
  });

  it('should freeze the resolved configuration', () => {
    const config = resolveOptimizationConfig({}, defaults);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.settings)).toBe(true);
  });

  describe('validation', () => {
    it('should reject a non-positive dimension', () => {
      expect(validationDetails({ dimension: 0 })).toEqual([
        expect.objectContaining({ path: 'dimension' }),
      ]);
    });

    it('should reject a non-positive budget', () => {
      expect(validationDetails({ evaluations: -1 })).toEqual([
        expect.objectContaining({ path: 'evaluations' }),
      ]);
    });

    it('should reject wrongly typed fields', () => {
      expect(validationDetails({ rank: 'four' })).toEqual([
        expect.objectContaining({ path: 'rank' }),
      ]);
    });

    it('should reject bodies that are not objects', () => {
      expect(() => resolveOptimizationConfig([1, 2], defaults)).toThrow(ValidationError);
    });

    it('should reject unordered bounds', () => {
      expect(validationDetails({ lower_bound: 5, upper_bound: 1 })).toEqual([
        'lower_bound must be below upper_bound (dimension 0)',
      ]);
    });

    it('should reject bound vectors of the wrong length', () => {
      expect(validationDetails({ dimension: 3, lower_bound: [-1, -1] })).toEqual([
        'lower_bound has 2 entries, expected 3',
      ]);
    });

    it('should reject mixing grid_size with QTT factors', () => {
      expect(validationDetails({ grid_size: 8, grid_factor: 2 })).toEqual([
        'grid_size cannot be combined with grid_factor or grid_exponent',
      ]);
    });

    it('should reject a known minimizer of the wrong length', () => {
      expect(validationDetails({ dimension: 2, x_opt_real: [1, 1, 1] })).toEqual([
        'x_opt_real has 3 entries, expected 2',
      ]);
    });

    it('should reject seeds outside 32 bits', () => {
      expect(validationDetails({ seed: 2 ** 32 })).toEqual([
        expect.objectContaining({ path: 'seed' }),
      ]);
      expect(resolveOptimizationConfig({ seed: 2 ** 32 - 1 }, defaults).settings.seed).toBe(4294967295);
    });

    it('should reject an oversized dimension', () => {
      expect(validationDetails({ dimension: 1000000, evaluations: 100 })).toEqual([
        expect.objectContaining({ path: 'dimension' }),
      ]);
    });

    it('should reject a rank above the limit', () => {
      expect(validationDetails({ rank: 65 })).toEqual([
        expect.objectContaining({ path: 'rank' }),
      ]);
    });

    it('should reject tensors with too many modes', () => {
      expect(validationDetails({ dimension: 1000 })).toEqual([
        'tensor has 12000 modes, at most 2048 allowed',
      ]);
    });

    it('should reject search states that would not fit in memory', () => {
      expect(validationDetails({ dimension: 100, grid_size: 100000, rank: 64 })).toEqual([
        'search state of 40960640000 index entries exceeds 33554432; lower rank, dimension or grid size',
      ]);
    });

    it('should reject unknown objectives', () => {
      expect(() => resolveOptimizationConfig({ objective: 'himmelblau' }, defaults)).toThrow(
        'Unknown objective "himmelblau"; expected one of alpine, sphere, rastrigin',
      );
    });
  });
});
