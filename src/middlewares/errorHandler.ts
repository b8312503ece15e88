import { ErrorRequestHandler, RequestHandler, Response } from 'express';
import { ServiceError } from '../errors';
import { logger } from '../logger';

export interface ErrorResponseBody {
  error: string;
  status: 'error';
  status_code: number;
  timestamp: string;
}

export function createErrorResponse(message: string, statusCode: number): ErrorResponseBody {
  return {
    error: message,
    status: 'error',
    status_code: statusCode,
    timestamp: new Date().toISOString(),
  };
}

function logServiceError(error: ServiceError): void {
  const fields = { family: error.family, kind: error.kind, statusCode: error.statusCode, cause: error.cause };

  if (error.kind === 'data') {
    logger.warn(fields, error.message);
  } else {
    logger.error(fields, error.message);
  }
}

/** Writes the JSON error body for a typed failure. The wrapped cause is logged, never sent. */
export function sendServiceError(res: Response, error: ServiceError): void {
  logServiceError(error);
  res.status(error.statusCode).json(createErrorResponse(error.message, error.statusCode));
}

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json(createErrorResponse(`Route not found: ${req.method} ${req.path}`, 404));
};

export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof ServiceError) {
    sendServiceError(res, error);
    return;
  }

  logger.error({ err: error, method: req.method, path: req.path }, 'Unhandled request error');
  res.status(500).json(createErrorResponse('Internal server error', 500));
};
