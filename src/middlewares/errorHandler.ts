import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Maps framework errors that carry a client mistake onto AppError
 */
function toAppError(err: Error): AppError | null {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof multer.MulterError) {
    return AppError.badRequest(`Upload rejected: ${err.message}`, { code: err.code, field: err.field });
  }
  // body-parser marks malformed JSON with a 400 status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return AppError.badRequest('Malformed JSON body');
  }
  return null;
}

/**
 * Global error handling middleware
 */
export const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
  const appError = toAppError(err);

  const statusCode = appError?.statusCode ?? 500;
  const message = appError?.message ?? 'Internal Server Error';
  const isOperational = appError?.isOperational ?? false;

  // Log error
  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(appError?.details !== undefined && { details: appError.details }),
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
