/**
 * Request Context Middleware
 *
 * Assigns a request id (x-request-id or a fresh uuid), echoes it back, logs
 * the request and records its duration once the response is sent.
 */
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger from '../../utils/logger';
import { recordRequest } from '../../utils/metrics';

export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.get('x-request-id') || uuidv4();
  const startTime = Date.now();

  res.locals.requestId = requestId;
  res.setHeader('x-request-id', requestId);

  logger.info({
    method: req.method,
    path: req.path,
    requestId,
  }, 'Incoming request');

  res.on('finish', () => {
    const route = req.route?.path;
    recordRequest(req.method, typeof route === 'string' ? req.baseUrl + route : 'unmatched', res.statusCode, Date.now() - startTime);
  });

  next();
}
