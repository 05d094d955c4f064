/**
 * Error Handler Utility
 *
 * Provides standardized error handling across the application.
 * This includes error categorization, logging, and recovery mechanisms.
 */

import { Logger } from './logger';

/**
 * Error categories for better error handling
 */
export enum ErrorCategory {
  NETWORK = 'NETWORK',
  AUTHENTICATION = 'AUTHENTICATION',
  VALIDATION = 'VALIDATION',
  API = 'API',
  DATA = 'DATA',
  INTERNAL = 'INTERNAL',
  UNKNOWN = 'UNKNOWN'
}

/**
 * Extended Error class with additional properties
 */
export class AppError extends Error {
  category: ErrorCategory;
  originalError?: Error | unknown;
  context?: Record<string, unknown>;
  recoverable: boolean;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    originalError?: Error | unknown,
    context?: Record<string, unknown>,
    recoverable: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.category = category;
    this.originalError = originalError;
    this.context = context;
    this.recoverable = recoverable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }
}

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

/**
 * Read an HTTP status carried on an error object, if any
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (isError(error) && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
  return isError(error) ? error.message : String(error);
}

/**
 * Error handler utility class
 */
export class ErrorHandler {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Categorize an error based on its HTTP status, message or type
   */
  categorizeError(error: unknown): ErrorCategory {
    if (isAppError(error)) {
      return error.category;
    }

    if (!isError(error)) {
      return ErrorCategory.UNKNOWN;
    }

    const status = getErrorStatus(error);
    if (status === 401 || status === 403) {
      return ErrorCategory.AUTHENTICATION;
    }
    if (status === 400 || status === 422) {
      return ErrorCategory.VALIDATION;
    }
    if (status !== undefined) {
      return ErrorCategory.API;
    }

    const errorMessage = error.message.toLowerCase();

    if (
      errorMessage.includes('network') ||
      errorMessage.includes('timeout') ||
      errorMessage.includes('connection') ||
      errorMessage.includes('enotfound') ||
      errorMessage.includes('econnrefused') ||
      errorMessage.includes('etimedout') ||
      errorMessage.includes('socket') ||
      errorMessage.includes('dns')
    ) {
      return ErrorCategory.NETWORK;
    }

    if (
      errorMessage.includes('auth') ||
      errorMessage.includes('token') ||
      errorMessage.includes('unauthorized') ||
      errorMessage.includes('forbidden') ||
      errorMessage.includes('permission') ||
      errorMessage.includes('api key') ||
      errorMessage.includes('credentials')
    ) {
      return ErrorCategory.AUTHENTICATION;
    }

    if (
      errorMessage.includes('validation') ||
      errorMessage.includes('invalid') ||
      errorMessage.includes('required') ||
      errorMessage.includes('missing')
    ) {
      return ErrorCategory.VALIDATION;
    }

    if (
      errorMessage.includes('api') ||
      errorMessage.includes('http') ||
      errorMessage.includes('status') ||
      errorMessage.includes('response')
    ) {
      return ErrorCategory.API;
    }

    if (
      errorMessage.includes('data') ||
      errorMessage.includes('parse') ||
      errorMessage.includes('json') ||
      errorMessage.includes('format')
    ) {
      return ErrorCategory.DATA;
    }

    return ErrorCategory.INTERNAL;
  }

  /**
   * Create a standardized AppError from any error
   * @param error Original error
   * @param context Additional context information
   * @param message Optional custom message
   */
  createAppError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    if (isAppError(error)) {
      if (context) {
        error.context = { ...error.context, ...context };
      }
      return error;
    }

    const category = this.categorizeError(error);
    const errorMessage = isError(error)
      ? message || error.message
      : message || String(error);

    return new AppError(
      errorMessage,
      category,
      error,
      context,
      category !== ErrorCategory.AUTHENTICATION // Auth errors are not recoverable by default
    );
  }

  /**
   * Log an error with standardized format
   * @returns The AppError that was logged
   */
  logError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    const appError = this.createAppError(error, context, message);

    const logContext = {
      category: appError.category,
      recoverable: appError.recoverable,
      ...(appError.context || {})
    };

    switch (appError.category) {
      case ErrorCategory.NETWORK:
        this.logger.warn(`Network Error: ${appError.message}`, logContext);
        break;
      case ErrorCategory.VALIDATION:
        this.logger.warn(`Validation Error: ${appError.message}`, logContext);
        break;
      case ErrorCategory.AUTHENTICATION:
        this.logger.error(`Authentication Error: ${appError.message}`, appError.originalError, logContext);
        break;
      default:
        this.logger.error(`${appError.category} Error: ${appError.message}`, appError.originalError, logContext);
    }

    return appError;
  }
}
