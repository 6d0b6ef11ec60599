/**
 * CLI Input Validation Utilities
 *
 * Field validators for flag values and shell arguments. Each returns the
 * parsed value or an error message naming the field.
 *
 * @module cli/utils/validators
 */

import type { CommandResult } from '../types.js';

/**
 * Validation error with field context
 */
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export type FieldCheck<T> = { valid: true; value: T } | { valid: false; error: string };

/**
 * Field validator function type
 */
export type FieldValidator<T> = (value: unknown, fieldName: string) => FieldCheck<T>;

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return NaN;
}

/**
 * Numeric range validator factory
 */
export function numberInRange(min: number, max: number): FieldValidator<number> {
  return (value, fieldName) => {
    const num = toNumber(value);
    if (isNaN(num)) {
      return { valid: false, error: `${fieldName} must be a number` };
    }
    if (num < min || num > max) {
      return { valid: false, error: `${fieldName} must be between ${min} and ${max}` };
    }
    return { valid: true, value: num };
  };
}

/**
 * Integer range validator factory
 */
export function integerInRange(min: number, max: number): FieldValidator<number> {
  const inRange = numberInRange(min, max);
  return (value, fieldName) => {
    const result = inRange(value, fieldName);
    if (result.valid && !Number.isInteger(result.value)) {
      return { valid: false, error: `${fieldName} must be an integer` };
    }
    return result;
  };
}

/** Seeds are unsigned 32-bit integers */
export const isValidSeed = integerInRange(0, 0xffffffff);

export const isValidStepCount = integerInRange(0, 1000);

/** 0 asks the OS for a free port */
export const isValidPort = integerInRange(0, 65535);

export const isValidStrength = numberInRange(0, 1);

/**
 * Non-empty string validator
 */
export const isNonEmptyString: FieldValidator<string> = (value, fieldName) => {
  if (typeof value !== 'string') {
    return { valid: false, error: `${fieldName} must be a string` };
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return { valid: false, error: `${fieldName} cannot be empty` };
  }
  return { valid: true, value: trimmed };
};

/**
 * Run a validator, collecting its error instead of returning it
 */
export function check<T>(
  validator: FieldValidator<T>,
  value: unknown,
  fieldName: string,
  errors: ValidationError[]
): T | undefined {
  const result = validator(value, fieldName);
  if (result.valid) {
    return result.value;
  }
  errors.push({ field: fieldName, message: result.error, value });
  return undefined;
}

/**
 * Create a validation error CommandResult
 */
export function validationError(errors: ValidationError[]): CommandResult {
  const errorMessages = errors.map(e => `  - ${e.field}: ${e.message}`).join('\n');
  return {
    success: false,
    error: `Validation failed:\n${errorMessages}`,
  };
}

/**
 * Create a CommandResult for missing required argument
 */
export function missingArgError(argName: string, usage: string): CommandResult {
  return {
    success: false,
    error: `Missing required argument: ${argName}\nUsage: ${usage}`,
  };
}
