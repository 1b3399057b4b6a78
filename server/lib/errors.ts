import type { NextFunction, Request, RequestHandler, Response } from 'express';

export interface ApiErrorResponse {
  status: 'error';
  message: string;
  code?: string;
  details?: unknown;
  timestamp: string;
  path?: string;
}

export interface ApiSuccessResponse<T = unknown> {
  status: 'success';
  data: T;
  message?: string;
  timestamp: string;
}

export class AppError extends Error {
  public statusCode: number;
  public code: string;
  public details?: unknown;

  constructor(message: string, statusCode: number = 500, code?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code || this.getDefaultCode(statusCode);

    Error.captureStackTrace(this, this.constructor);
  }

  private getDefaultCode(statusCode: number): string {
    switch (statusCode) {
      case 400: return 'BAD_REQUEST';
      case 401: return 'UNAUTHORIZED';
      case 403: return 'FORBIDDEN';
      case 404: return 'NOT_FOUND';
      case 409: return 'CONFLICT';
      case 422: return 'VALIDATION_ERROR';
      case 429: return 'RATE_LIMIT_EXCEEDED';
      case 500: return 'INTERNAL_SERVER_ERROR';
      case 503: return 'SERVICE_UNAVAILABLE';
      default: return 'UNKNOWN_ERROR';
    }
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 422, 'VALIDATION_ERROR');
    this.details = details;
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

// Cart and sale errors

export class InvalidQuantityError extends AppError {
  constructor(quantity: unknown, message: string = 'Quantity must be a positive whole number.') {
    super(message, 422, 'INVALID_QUANTITY');
    this.details = { quantity };
  }
}

export class InvalidPriceError extends AppError {
  constructor(price: unknown, message: string = 'Price must be a non-negative amount.') {
    super(message, 422, 'INVALID_PRICE');
    this.details = { price };
  }
}

/** A line subtotal or sale total past what a sale row can record. */
export class SaleLimitError extends AppError {
  constructor(limit: string) {
    super(`The sale cannot exceed ${limit}.`, 422, 'SALE_LIMIT_EXCEEDED');
    this.details = { limit };
  }
}

export class InvalidNameError extends AppError {
  constructor(field: string, maxLength: number) {
    super(`${field} must be at most ${maxLength} characters.`, 422, 'VALIDATION_ERROR');
    this.details = { field, maxLength };
  }
}

export class EmptyCartError extends AppError {
  constructor() {
    super('Cannot finalize an empty sale.', 400, 'EMPTY_CART');
  }
}

export type LedgerOperation = 'finalize' | 'delete' | 'sync';

export class TransactionFailureError extends AppError {
  public readonly operation: LedgerOperation;

  constructor(operation: LedgerOperation, cause?: unknown) {
    super(`The ${operation} operation could not be completed. No changes were saved; please try again.`, 503, 'TRANSACTION_FAILED');
    this.operation = operation;
    this.details = { operation, retryable: true };
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ReportUnavailableError extends AppError {
  constructor(report: string, cause?: unknown) {
    super(`The ${report} report could not be computed right now.`, 503, 'REPORT_UNAVAILABLE');
    this.details = { report };
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function sendErrorResponse(res: Response, error: AppError | Error, path?: string): void {
  let apiError: ApiErrorResponse;

  if (error instanceof AppError) {
    apiError = {
      status: 'error',
      message: error.message,
      code: error.code,
      details: error.details,
      timestamp: new Date().toISOString(),
      path
    };
  } else {
    // For any other errors, return generic message to avoid exposing internal details
    apiError = {
      status: 'error',
      message: 'An error occurred. Please try again later.',
      code: 'INTERNAL_SERVER_ERROR',
      timestamp: new Date().toISOString(),
      path
    };
  }

  const statusCode = error instanceof AppError ? error.statusCode : 500;
  res.status(statusCode).json(apiError);
}

export function sendSuccessResponse<T>(res: Response, data: T, message?: string, statusCode: number = 200): void {
  const response: ApiSuccessResponse<T> = {
    status: 'success',
    data,
    message,
    timestamp: new Date().toISOString()
  };
  res.status(statusCode).json(response);
}

export function handleAsyncError(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
