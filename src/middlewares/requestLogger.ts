import { RequestHandler } from 'express';
import { logger } from '../logger';

/** Logs method, path, status and duration once the response is sent. */
export const requestLogger: RequestHandler = (req, res, next) => {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
    logger.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Number(durationMs.toFixed(2)),
      },
      'Request completed'
    );
  });

  next();
};
