import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { S3Error } from '../s3/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Writes the response for errors the S3 API knows how to describe. Returns false for
 * anything else so the caller can let it propagate.
 */
export function sendS3Error(res: Response, err: unknown): boolean {
  if (err instanceof S3Error) {
    res.status(err.status).json({ code: err.code, message: err.message });
    return true;
  }
  if (err instanceof ZodError) {
    res
      .status(400)
      .json({ code: 'InvalidArgument', message: 'Invalid request', details: err.flatten() });
    return true;
  }
  return false;
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
) {
  if (sendS3Error(res, err)) return;
  // body-parser and friends attach an HTTP status to their errors
  const status =
    typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
      ? err.status
      : 500;
  if (status >= 500) {
    logger.error({ err, method: req.method, url: req.originalUrl }, 'unhandled error');
    return res.status(500).json({ code: 'InternalError', message: 'Internal Server Error' });
  }
  const message = err instanceof Error ? err.message : 'Request failed';
  res.status(status).json({ code: 'InvalidRequest', message });
}
