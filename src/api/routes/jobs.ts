/**
 * Optimization Job Routes
 *
 * Asynchronous counterpart of POST /optimize: submit a run, poll it, cancel it.
 */
import { Router, Request, Response, NextFunction } from 'express';
import { OptimizerDefaults } from '../../config';
import { resolveOptimizationConfig } from '../../contracts/optimize';
import { JobRunner } from '../../jobs';

export function createJobsRouter(runner: JobRunner, defaults: OptimizerDefaults): Router {
  const router = Router();

  /**
   * POST /api/v1/jobs
   * Same body as POST /optimize. Answers 202 with the queued job.
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const config = resolveOptimizationConfig(req.body, defaults);
      const job = runner.submit(config);
      res.status(202).location(`${req.baseUrl}/${job.job_id}`).json(job);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/jobs
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ jobs: runner.list(), counts: runner.countByStatus() });
  });

  /**
   * GET /api/v1/jobs/:id
   */
  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(runner.get(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/v1/jobs/:id
   * Cancels a queued or running job; 409 once it has finished.
   */
  router.delete('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(runner.cancel(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
