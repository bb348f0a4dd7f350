import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

export class AppError extends Error {
  statusCode: number;
  status: string;
  isOperational: boolean;
  retryable: boolean;

  constructor(message: string, statusCode: number, retryable = false) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.status = `${statusCode}`.startsWith('4') ? 'fail' : 'error';
    this.isOperational = true;
    this.retryable = retryable;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Missing, empty or malformed input from the caller. */
export class CallerInputError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** robots.txt, rate-limit or content-type rejection. */
export class PolicyDeniedError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class NetworkError extends AppError {
  constructor(message: string) {
    super(message, 500, true);
  }
}

export class ExtractionEmptyError extends AppError {
  constructor(message = 'No substantial content found on page') {
    super(message, 500);
  }
}

/** The model answered, but not with a usable JSON object. */
export class LlmFormatError extends AppError {
  constructor(message: string) {
    super(message, 500, true);
  }
}

/** The model could not be reached or refused the request. */
export class LlmServiceError extends AppError {
  constructor(message: string) {
    super(message, 500, true);
  }
}

export class StoreError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
) => {
  if (err instanceof AppError) {
    logger.error({
      message: err.message,
      statusCode: err.statusCode,
      stack: err.stack,
    });

    return res.status(err.statusCode).json({
      status: err.status,
      message: err.message,
    });
  }

  // express.json() rejects unparseable bodies with a SyntaxError carrying the raw body
  if (err instanceof SyntaxError && 'body' in err) {
    logger.warn(`Malformed JSON body: ${err.message}`);
    return res.status(400).json({
      status: 'fail',
      message: 'Malformed JSON body',
    });
  }

  // Programming or other unknown error
  logger.error({
    message: err.message,
    error: err,
    stack: err.stack,
  });

  return res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
};

/**
 * Catch-all for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({ error: 'Resource not found' });
};
