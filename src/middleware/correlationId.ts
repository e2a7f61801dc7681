import { Request, Response, NextFunction } from 'express';
import { getCorrelationId } from '../utils/errors';
import '../types/express';

/**
 * Gives every request a correlation id, reusing the caller's
 * `x-request-id` or `x-correlation-id` when one is sent. Mount it first.
 */
export const correlationIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = getCorrelationId(req);

  req.correlationId = correlationId;
  res.setHeader('x-request-id', correlationId);
  res.setHeader('x-correlation-id', correlationId);

  next();
};
