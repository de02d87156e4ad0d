import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';
import { AppError, ConnectivityError, ConstraintViolationError, ServiceError } from '../utils/errors';
import { logger } from '../utils/logger';

interface ErrorBody {
  success: false;
  error: string;
  code?: string;
}

function toResponse(err: Error): { status: number; body: ErrorBody } {
  if (err instanceof ConnectivityError) {
    return { status: 503, body: { success: false, error: 'Ledger temporarily unavailable', code: 'unavailable' } };
  }
  if (err instanceof ServiceError) {
    return { status: 502, body: { success: false, error: `${err.service} call failed`, code: 'upstream' } };
  }
  if (err instanceof ConstraintViolationError) {
    return { status: 409, body: { success: false, error: err.message, code: 'conflict' } };
  }
  if (err instanceof AppError) {
    // Non-operational errors (unreadable rows) keep their detail in the log only
    const message = err.isOperational ? err.message : 'Internal server error';
    return { status: err.statusCode, body: { success: false, error: message } };
  }
  const message = env.NODE_ENV === 'production' ? 'Internal server error' : err.message;
  return { status: 500, body: { success: false, error: message } };
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const { status, body } = toResponse(err);
  const meta = { error: err.message, path: req.path, method: req.method, status };

  if (status >= 500) {
    logger.error('Request failed', { ...meta, stack: err.stack });
  } else {
    logger.warn('Request rejected', meta);
  }

  res.status(status).json(body);
}
