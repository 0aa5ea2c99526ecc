import { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import { logger } from '../utils/logger';
import { appConfig } from '../config';

export class ApiError extends Error {
  statusCode: number;
  isOperational: boolean;
  details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

interface DuplicateKeyError {
  code: number;
  keyValue?: Record<string, unknown>;
}

const isDuplicateKeyError = (err: unknown): err is DuplicateKeyError =>
  typeof err === 'object' &&
  err !== null &&
  'code' in err &&
  err.code === 11000;

/**
 * Normalizes anything thrown by a route into an ApiError.
 */
export const toApiError = (err: unknown): ApiError => {
  if (err instanceof ApiError) {
    return err;
  }

  // Handle duplicate field errors
  if (isDuplicateKeyError(err)) {
    const field = Object.keys(err.keyValue ?? {})[0] ?? 'field';
    return new ApiError(400, `Duplicate field value entered for ${field}`);
  }

  // Handle schema validation errors
  if (err instanceof mongoose.Error.ValidationError) {
    const messages = Object.values(err.errors).map((val) => val.message);
    return new ApiError(400, messages.join('. '));
  }

  if (err instanceof mongoose.Error.CastError) {
    return new ApiError(404, `Resource not found with id of ${String(err.value)}`);
  }

  // Malformed JSON bodies rejected by express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return new ApiError(400, 'Malformed JSON body');
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ApiError(500, message, undefined, false);
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
) => {
  const error = toApiError(err);

  if (error.statusCode >= 500) {
    logger.error(`[${req.method}] ${req.originalUrl} failed: ${error.message}`, {
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn(`[${req.method}] ${req.originalUrl} rejected: ${error.message}`);
  }

  res.status(error.statusCode).json({
    success: false,
    error: error.isOperational || !appConfig.isProduction ? error.message : 'Server Error',
    ...(error.details !== undefined ? { details: error.details } : {}),
    ...(appConfig.isProduction ? {} : { stack: err instanceof Error ? err.stack : undefined }),
  });
};

export const notFound = (req: Request, res: Response, next: NextFunction) => {
  next(new ApiError(404, `Not Found - ${req.originalUrl}`));
};
