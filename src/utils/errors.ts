/**
 * Service error classes.
 *
 * Every error the service raises on purpose carries a stable code and the
 * HTTP status the error handler should answer with.
 */
export class OptimizerServiceError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(message: string, code: string, statusCode = 500, details?: unknown) {
    super(message);
    this.name = 'OptimizerServiceError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Maps to HTTP 400: the request asked for an impossible configuration.
 */
export class ValidationError extends OptimizerServiceError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class JobNotFoundError extends OptimizerServiceError {
  constructor(jobId: string) {
    super(`Job ${jobId} not found`, 'JOB_NOT_FOUND', 404, { job_id: jobId });
    this.name = 'JobNotFoundError';
  }
}

/**
 * Maps to HTTP 409: the job is in a state that does not allow the operation.
 */
export class JobStateError extends OptimizerServiceError {
  constructor(message: string, details?: unknown) {
    super(message, 'JOB_STATE_CONFLICT', 409, details);
    this.name = 'JobStateError';
  }
}

export class OptimizationCancelledError extends OptimizerServiceError {
  constructor(message = 'Optimization was cancelled') {
    super(message, 'OPTIMIZATION_CANCELLED', 499);
    this.name = 'OptimizationCancelledError';
  }
}

export class OptimizationTimeoutError extends OptimizerServiceError {
  constructor(timeoutMs: number) {
    super(`Optimization exceeded ${timeoutMs} ms`, 'OPTIMIZATION_TIMEOUT', 504, {
      timeout_ms: timeoutMs,
    });
    this.name = 'OptimizationTimeoutError';
  }
}
