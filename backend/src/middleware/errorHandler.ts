import { NextFunction } from 'express';
import { ErrorResponse } from '../types';

export class AppError extends Error {
  statusCode: number;
  code: string;
  retryable: boolean;
  details?: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    retryable: boolean = false,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.retryable = retryable;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AccountNotFoundError extends AppError {
  constructor(reference: string) {
    super(`Account ${reference} not found`, 404, 'ACCOUNT_NOT_FOUND', false, { account: reference });
    this.name = 'AccountNotFoundError';
  }
}

/** Webhook delivery whose signature does not match the account's app secret */
export class SignatureInvalidError extends AppError {
  constructor(message: string = 'Invalid webhook signature') {
    super(message, 403, 'SIGNATURE_INVALID');
    this.name = 'SignatureInvalidError';
  }
}

export class MalformedPayloadError extends AppError {
  constructor(message: string) {
    super(message, 400, 'MALFORMED_PAYLOAD');
    this.name = 'MalformedPayloadError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', false, details);
    this.name = 'ValidationError';
  }
}

/** The part of an Express Response the error handler writes to */
export interface ErrorReplyWriter {
  status(code: number): { json(body: ErrorResponse): unknown };
}

export const errorHandler = (
  err: Error,
  _req: unknown,
  res: ErrorReplyWriter,
  _next: NextFunction
) => {
  if (err instanceof AppError) {
    const errorResponse: ErrorResponse = {
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
        retryable: err.retryable,
      },
    };

    return res.status(err.statusCode).json(errorResponse);
  }

  // Handle unexpected errors
  console.error('Unexpected error:', err);
  const errorResponse: ErrorResponse = {
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      retryable: false,
    },
  };

  return res.status(500).json(errorResponse);
};
