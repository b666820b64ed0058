/**
 * Optimize Routes
 *
 * POST /optimize runs one optimization to completion on the request and
 * answers with the optimizer's status report. The body may override any
 * optimizer default; an empty body runs the defaults.
 */
import { Router, Request, Response, NextFunction } from 'express';
import { OptimizerDefaults } from '../../config';
import { OptimizeResponse, resolveOptimizationConfig } from '../../contracts/optimize';
import { runOptimization } from '../../services/optimization';
import logger from '../../utils/logger';

export function createOptimizeRouter(defaults: OptimizerDefaults): Router {
  const router = Router();

  /**
   * POST /optimize
   *
   * Blocks for the whole run. Use the jobs API for long runs.
   */
  router.post('/optimize', (req: Request, res: Response, next: NextFunction) => {
    try {
      const requestId: string = res.locals.requestId;
      logger.info({ requestId, body: req.body }, 'Optimize request body');

      const config = resolveOptimizationConfig(req.body, defaults);
      const summary = runOptimization(config, logger.child({ requestId }));

      const body: OptimizeResponse = { minimum_value: summary.report };
      res.status(200).json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
