/**
 * Error Handling Middleware
 *
 * Maps service errors to their HTTP status, body-parser failures to 4xx, and
 * anything else to 500. The process keeps serving after every one of them.
 */
import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { PlatformEnvironment } from '../../config';
import { OptimizerServiceError } from '../../utils/errors';
import logger from '../../utils/logger';

interface BodyParserError {
  type: string;
  status: number;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    'type' in err &&
    'status' in err &&
    typeof err.type === 'string' &&
    typeof err.status === 'number'
  );
}

/**
 * Forward rejections of async route handlers to the error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: `No route for ${req.method} ${req.path}`,
  });
}

export function createErrorHandler(environment: PlatformEnvironment): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = res.locals.requestId;

    if (err instanceof OptimizerServiceError) {
      logger.warn({ requestId, code: err.code, error: err.message }, 'Request rejected');
      res.status(err.statusCode).json({
        error: err.code,
        message: err.message,
        details: err.details,
      });
      return;
    }

    if (isBodyParserError(err)) {
      logger.warn({ requestId, type: err.type, error: err.message }, 'Request body rejected');
      res.status(err.status).json({
        error: err.type === 'entity.parse.failed' ? 'INVALID_JSON' : 'INVALID_BODY',
        message: err.message,
      });
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    logger.error({ requestId, error: error.message, stack: error.stack }, 'Request error');
    res.status(500).json({
      error: 'Internal server error',
      message: environment !== 'prod' ? error.message : undefined,
    });
  };
}
