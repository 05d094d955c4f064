/**
 * Validation utility functions
 * Provides helper functions for validating input parameters
 */

import { DateTime } from 'luxon';
import { AppError, ErrorCategory } from './error-handler';

function invalid(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCategory.VALIDATION, undefined, context, false);
}

/**
 * Validate a number value
 * @param value Value to validate
 * @param name Name of the parameter (for error messages)
 * @param options Validation options
 * @throws AppError if validation fails
 */
export function validateNumber(
  value: unknown,
  name: string,
  options: {
    min?: number;
    max?: number;
    integer?: boolean
  } = {}
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw invalid(`Invalid ${name}: must be a number`);
  }

  if (options.min !== undefined && value < options.min) {
    throw invalid(`Invalid ${name}: must be at least ${options.min}`);
  }

  if (options.max !== undefined && value > options.max) {
    throw invalid(`Invalid ${name}: must be at most ${options.max}`);
  }

  if (options.integer && !Number.isInteger(value)) {
    throw invalid(`Invalid ${name}: must be an integer`);
  }

  return value;
}

/**
 * Validate a string value
 * @param value Value to validate
 * @param name Name of the parameter (for error messages)
 * @param options Validation options
 * @throws AppError if validation fails
 */
export function validateString(
  value: unknown,
  name: string,
  options: {
    minLength?: number;
    maxLength?: number;
    pattern?: RegExp
  } = {}
): string {
  if (typeof value !== 'string') {
    throw invalid(`Invalid ${name}: must be a string`);
  }

  if (options.minLength !== undefined && value.length < options.minLength) {
    throw invalid(`Invalid ${name}: must be at least ${options.minLength} characters`);
  }

  if (options.maxLength !== undefined && value.length > options.maxLength) {
    throw invalid(`Invalid ${name}: must be at most ${options.maxLength} characters`);
  }

  if (options.pattern !== undefined && !options.pattern.test(value)) {
    throw invalid(`Invalid ${name}: does not match required pattern`);
  }

  return value;
}

/**
 * Validate a calendar date in yyyy-MM-dd form
 * @throws AppError if the string is not a real calendar date
 */
export function validateIsoDate(value: unknown, name: string): string {
  const text = validateString(value, name, { pattern: /^\d{4}-\d{2}-\d{2}$/ });
  if (!DateTime.fromISO(text, { zone: 'utc' }).isValid) {
    throw invalid(`Invalid ${name}: ${text} is not a calendar date`, { value: text });
  }
  return text;
}

/**
 * Validate that a value is one of a fixed set of options
 */
export function validateOneOf<T extends string>(
  value: unknown,
  name: string,
  allowed: readonly T[]
): T {
  const match = allowed.find(option => option === value);
  if (match === undefined) {
    throw invalid(`Invalid ${name}: must be one of ${allowed.join(', ')}`, { value });
  }
  return match;
}

/**
 * Parse an optional integer taken from an environment variable
 * @returns The fallback when the variable is unset or blank
 */
export function parseIntegerSetting(
  raw: string | undefined,
  name: string,
  fallback: number,
  options: { min?: number; max?: number } = {}
): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return validateNumber(Number(raw.trim()), name, { ...options, integer: true });
}
