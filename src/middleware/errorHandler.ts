import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';

export interface FieldViolation {
  field: string;
  rule: string;
  value: unknown;
  message: string;
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ValidationError extends AppError {
  constructor(
    public readonly errors: FieldViolation[],
    message = 'Validation failed'
  ) {
    super(message, 422);
  }
}

type Handler = (req: Request, res: Response, next: NextFunction) => unknown;

// Forwards both thrown errors and rejected promises to the error middleware
export const asyncHandler = (fn: Handler): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
};

const isBodyParseError = (err: unknown): err is SyntaxError & { status: number } =>
  err instanceof SyntaxError && 'status' in err && err.status === 400;

// http-errors raised by body parsing: 413 entity.too.large, 415 charset.unsupported, 400 request.aborted
const isClientHttpError = (err: unknown): err is Error & { status: number } =>
  err instanceof Error &&
  'status' in err &&
  typeof err.status === 'number' &&
  err.status >= 400 &&
  err.status < 500 &&
  'expose' in err &&
  err.expose === true;

export const notFoundHandler = (req: Request, res: Response, next: NextFunction) => {
  next(new NotFoundError(`Route ${req.method} ${req.originalUrl} not found`));
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument functions as error middleware
  next: NextFunction
) => {
  if (err instanceof ValidationError) {
    logger.debug(`Validation failed for ${req.method} ${req.originalUrl}`);
    res.status(err.statusCode).json({
      success: false,
      message: err.message,
      errors: err.errors
    });
    return;
  }

  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      success: false,
      message: err.message
    });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({
      success: false,
      message: 'Malformed JSON in request body'
    });
    return;
  }

  if (isClientHttpError(err)) {
    res.status(err.status).json({
      success: false,
      message: err.message
    });
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  res.status(500).json({
    success: false,
    message: 'Internal server error'
  });
};
