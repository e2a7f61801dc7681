import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger } from '../utils/logger';
import { AppError, ErrorResponse, getCorrelationId } from '../utils/errors';
import '../types/express';

interface BodyParserError {
  type: string;
  status?: number;
}

const isBodyParserError = (error: unknown): error is BodyParserError =>
  typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string';

const summarize = (error: unknown) =>
  error instanceof Error
    ? { message: error.message, name: error.name, stack: error.stack }
    : { message: String(error) };

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const requestId = req.correlationId ?? getCorrelationId(req);

  const send = (status: number, body: Omit<ErrorResponse['error'], 'timestamp' | 'requestId' | 'path'>) => {
    const response: ErrorResponse = {
      error: {
        ...body,
        timestamp: new Date().toISOString(),
        requestId,
        path: req.originalUrl
      }
    };
    res.status(status).json(response);
  };

  if (error instanceof AppError) {
    const meta = {
      code: error.code,
      error: error.message,
      requestId,
      method: req.method,
      url: req.originalUrl,
      userId: req.principal?.id
    };
    if (error.statusCode >= 500) {
      logger.error('Request failed', meta);
    } else {
      logger.warn('Request failed', meta);
    }

    const hide = error.statusCode >= 500 && config.nodeEnv === 'production';
    send(error.statusCode, {
      code: error.code,
      message: hide ? 'An unexpected error occurred' : error.message,
      details: hide ? undefined : error.details
    });
    return;
  }

  if (isBodyParserError(error)) {
    if (error.type === 'entity.parse.failed') {
      send(400, { code: 'INVALID_JSON', message: 'Invalid JSON in request body' });
      return;
    }
    if (error.type === 'entity.too.large') {
      send(413, { code: 'PAYLOAD_TOO_LARGE', message: 'Request payload is too large' });
      return;
    }
  }

  const described = summarize(error);
  logger.error('Unhandled request error', {
    ...described,
    requestId,
    method: req.method,
    url: req.originalUrl,
    userId: req.principal?.id
  });

  send(500, {
    code: 'INTERNAL_SERVER_ERROR',
    message: config.nodeEnv === 'production' ? 'An unexpected error occurred' : described.message,
    details: config.nodeEnv === 'development' ? { stack: described.stack, name: described.name } : undefined
  });
};

/**
 * Terminal handler for unmatched routes.
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  const response: ErrorResponse = {
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString(),
      requestId: req.correlationId ?? getCorrelationId(req),
      path: req.originalUrl
    }
  };
  res.status(404).json(response);
};
