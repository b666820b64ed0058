/**
 * TT-Optimize Service Configuration
 *
 * All configuration is resolved via environment variables, once, at startup.
 * Optimizer defaults reproduce the fixed run the service was built around:
 * Alpine function, 100 dimensions, [-10, 10] grid with 2^12 points, 1e5 evaluations.
 * They obey the same rules as request overrides and are rejected at startup
 * otherwise.
 */
import { z } from 'zod';
import { getObjective, listObjectives } from '../objectives';
import { MAX_DIMENSION, MAX_GRID_POINTS, MAX_RANK, MAX_SEED, problemSizeIssue } from '../optimizer/limits';

export type PlatformEnvironment = 'dev' | 'staging' | 'prod';

export interface OptimizerDefaults {
  dimension: number;
  lowerBound: number;
  upperBound: number;
  gridFactor: number;
  gridExponent: number;
  evaluations: number;
  rank: number;
  seed: number;
  objective: string;
  name: string;
  /** Every coordinate of the known minimizer reported against for the default objective */
  xOptReal: number;
  withLog: boolean;
  withCache: boolean;
}

export interface ServiceConfig {
  service: {
    name: string;
    version: string;
    host: string;
    port: number;
    environment: PlatformEnvironment;
    bodyLimit: string;
  };
  optimizer: OptimizerDefaults;
  jobs: {
    concurrency: number;
    timeoutMs: number;
    retentionMs: number;
  };
}

type Env = Record<string, string | undefined>;

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be numeric, got "${value}"`);
  }
  return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvironment(env: Env): PlatformEnvironment {
  const value = getEnvOrDefault(env, 'PLATFORM_ENV', 'dev');
  if (value === 'dev' || value === 'staging' || value === 'prod') {
    return value;
  }
  throw new Error(`PLATFORM_ENV must be one of dev, staging, prod; got "${value}"`);
}

const OptimizerDefaultsSchema = z
  .object({
    dimension: z.number().int().positive().max(MAX_DIMENSION),
    lowerBound: z.number(),
    upperBound: z.number(),
    gridFactor: z.number().int().min(2).max(MAX_GRID_POINTS),
    gridExponent: z.number().int().positive().max(Math.log2(MAX_GRID_POINTS)),
    evaluations: z.number().positive(),
    rank: z.number().int().positive().max(MAX_RANK),
    seed: z.number().int().nonnegative().max(MAX_SEED),
    objective: z.string(),
    name: z.string(),
    xOptReal: z.number(),
    withLog: z.boolean(),
    withCache: z.boolean(),
  })
  .superRefine((defaults, ctx) => {
    if (!(defaults.lowerBound < defaults.upperBound)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lowerBound'],
        message: `must be below upperBound (${defaults.lowerBound} >= ${defaults.upperBound})`,
      });
    }
    if (!getObjective(defaults.objective)) {
      const known = listObjectives().map((o) => o.id).join(', ');
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['objective'],
        message: `Unknown objective "${defaults.objective}"; expected one of ${known}`,
      });
    }
    const sizeIssue = problemSizeIssue({
      dimension: defaults.dimension,
      rank: defaults.rank,
      grid: { kind: 'qtt', factor: defaults.gridFactor, exponent: defaults.gridExponent },
    });
    if (sizeIssue) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dimension'], message: sizeIssue });
    }
  });

function validateOptimizerDefaults(defaults: OptimizerDefaults): OptimizerDefaults {
  const parsed = OptimizerDefaultsSchema.safeParse(defaults);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid optimizer defaults: ${issues.join('; ')}`);
  }
  return parsed.data;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export function loadConfig(env: Env = process.env): Readonly<ServiceConfig> {
  return deepFreeze({
    service: {
      name: getEnvOrDefault(env, 'SERVICE_NAME', 'tt-optimize'),
      version: getEnvOrDefault(env, 'SERVICE_VERSION', '1.0.0'),
      host: getEnvOrDefault(env, 'HOST', '0.0.0.0'),
      port: getEnvNumber(env, 'PORT', 5000),
      environment: getEnvironment(env),
      bodyLimit: getEnvOrDefault(env, 'BODY_LIMIT', '1mb'),
    },
    optimizer: validateOptimizerDefaults({
      dimension: getEnvNumber(env, 'OPT_DIMENSION', 100),
      lowerBound: getEnvNumber(env, 'OPT_LOWER_BOUND', -10),
      upperBound: getEnvNumber(env, 'OPT_UPPER_BOUND', 10),
      gridFactor: getEnvNumber(env, 'OPT_GRID_FACTOR', 2),
      gridExponent: getEnvNumber(env, 'OPT_GRID_EXPONENT', 12),
      evaluations: getEnvNumber(env, 'OPT_EVALUATIONS', 100000),
      rank: getEnvNumber(env, 'OPT_RANK', 4),
      seed: getEnvNumber(env, 'OPT_SEED', 42),
      objective: getEnvOrDefault(env, 'OPT_OBJECTIVE', 'alpine'),
      name: getEnvOrDefault(env, 'OPT_NAME', 'Alpine'),
      xOptReal: getEnvNumber(env, 'OPT_X_OPT_REAL', 1),
      withLog: getEnvBoolean(env, 'OPT_WITH_LOG', true),
      withCache: getEnvBoolean(env, 'OPT_WITH_CACHE', false),
    }),
    jobs: {
      concurrency: getEnvNumber(env, 'JOB_CONCURRENCY', 1),
      timeoutMs: getEnvNumber(env, 'JOB_TIMEOUT_MS', 600000), // 10 minutes
      retentionMs: getEnvNumber(env, 'JOB_RETENTION_MS', 3600000), // 1 hour
    },
  });
}

export const config = loadConfig();
