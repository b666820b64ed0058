/**
 * TT-Optimize API Server
 *
 * Endpoints:
 * - POST /optimize - Run one optimization synchronously
 * - POST /api/v1/jobs - Submit an optimization job
 * - GET /api/v1/jobs/:id - Job status and result
 * - DELETE /api/v1/jobs/:id - Cancel a job
 * - GET /api/v1/info - Service info, optimizer defaults, objectives
 * - GET /metrics - Prometheus metrics
 * - GET /health - Health check
 * - GET /ready - Readiness check
 */
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';

import { config as defaultConfig, ServiceConfig } from '../config';
import { JobRunner } from '../jobs';
import { listObjectives } from '../objectives';
import logger from '../utils/logger';
import { metricsRegistry } from '../utils/metrics';
import { asyncHandler, createErrorHandler, notFoundHandler } from './middleware/error-handler';
import { requestContext } from './middleware/request-context';
import { createJobsRouter } from './routes/jobs';
import { createOptimizeRouter } from './routes/optimize';

export interface AppDependencies {
  config: Readonly<ServiceConfig>;
  jobRunner: JobRunner;
}

export function createJobRunner(config: Readonly<ServiceConfig>): JobRunner {
  return new JobRunner({
    concurrency: config.jobs.concurrency,
    timeoutMs: config.jobs.timeoutMs,
    retentionMs: config.jobs.retentionMs,
  });
}

export function createApp({ config, jobRunner }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(compression());
  app.use(express.json({ limit: config.service.bodyLimit }));
  app.use(requestContext);

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      service: config.service.name,
      version: config.service.version,
      environment: config.service.environment,
      timestamp: new Date().toISOString(),
      jobs: jobRunner.countByStatus(),
    });
  });

  // Readiness check
  app.get('/ready', (_req: Request, res: Response) => {
    res.status(200).json({
      ready: true,
      service: config.service.name,
      version: config.service.version,
    });
  });

  // Service info
  app.get('/api/v1/info', (_req: Request, res: Response) => {
    res.json({
      service: config.service.name,
      version: config.service.version,
      environment: config.service.environment,
      defaults: config.optimizer,
      objectives: listObjectives().map(({ id, label, description }) => ({ id, label, description })),
      endpoints: {
        optimize: '/optimize',
        jobs: '/api/v1/jobs',
      },
    });
  });

  app.get(
    '/metrics',
    asyncHandler(async (_req: Request, res: Response, _next: NextFunction) => {
      res.set('Content-Type', metricsRegistry.contentType);
      res.send(await metricsRegistry.metrics());
    }),
  );

  app.use(createOptimizeRouter(config.optimizer));
  app.use('/api/v1/jobs', createJobsRouter(jobRunner, config.optimizer));

  app.use(notFoundHandler);
  app.use(createErrorHandler(config.service.environment));

  return app;
}

// Start server
export function startServer(config: Readonly<ServiceConfig> = defaultConfig): void {
  const jobRunner = createJobRunner(config);
  const app = createApp({ config, jobRunner });
  const { host, port } = config.service;

  const server = app.listen(port, host, () => {
    logger.info({
      service: config.service.name,
      version: config.service.version,
      host,
      port,
      environment: config.service.environment,
    }, 'TT-Optimize service started');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    jobRunner.close();
    server.close((error) => {
      if (error) {
        logger.error({ error: error.message }, 'Server close failed');
        process.exitCode = 1;
      }
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

// Start if running directly
if (require.main === module) {
  startServer();
}
