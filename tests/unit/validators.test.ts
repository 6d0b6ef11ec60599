/**
 * Unit Tests - CLI Input Validators
 */

import { describe, it, expect } from 'vitest';
import {
  check,
  integerInRange,
  isNonEmptyString,
  isValidPort,
  isValidSeed,
  isValidStepCount,
  isValidStrength,
  missingArgError,
  numberInRange,
  validationError,
  type ValidationError,
} from '../../src/cli/utils/validators.js';

describe('Field Validators', () => {
  describe('numberInRange', () => {
    const inUnit = numberInRange(0, 1);

    it('should accept numbers and numeric strings in range', () => {
      expect(inUnit(0.5, 'x')).toEqual({ valid: true, value: 0.5 });
      expect(inUnit('1', 'x')).toEqual({ valid: true, value: 1 });
    });

    it('should reject non-numbers and values out of range', () => {
      expect(inUnit('abc', 'x')).toEqual({ valid: false, error: 'x must be a number' });
      expect(inUnit('', 'x')).toEqual({ valid: false, error: 'x must be a number' });
      expect(inUnit(2, 'x')).toEqual({ valid: false, error: 'x must be between 0 and 1' });
    });
  });

  describe('integerInRange', () => {
    it('should reject fractions', () => {
      expect(integerInRange(0, 10)('2.5', 'n')).toEqual({ valid: false, error: 'n must be an integer' });
    });
  });

  describe('isValidSeed', () => {
    it('should accept unsigned 32-bit integers', () => {
      expect(isValidSeed('42', 'seed')).toEqual({ valid: true, value: 42 });
      expect(isValidSeed(4294967295, 'seed').valid).toBe(true);
    });

    it('should reject negatives and overflow', () => {
      expect(isValidSeed('-1', 'seed').valid).toBe(false);
      expect(isValidSeed(4294967296, 'seed').valid).toBe(false);
      expect(isValidSeed(undefined, 'seed')).toEqual({ valid: false, error: 'seed must be a number' });
    });
  });

  describe('ranges', () => {
    it('should bound steps, ports and strengths', () => {
      expect(isValidStepCount('1001', 'steps')).toEqual({ valid: false, error: 'steps must be between 0 and 1000' });
      expect(isValidPort('0', 'port')).toEqual({ valid: true, value: 0 });
      expect(isValidPort('70000', 'port').valid).toBe(false);
      expect(isValidStrength('0.15', 'inhibition')).toEqual({ valid: true, value: 0.15 });
    });
  });

  describe('isNonEmptyString', () => {
    it('should trim and reject blanks', () => {
      expect(isNonEmptyString('  hi ', 'text')).toEqual({ valid: true, value: 'hi' });
      expect(isNonEmptyString('   ', 'text')).toEqual({ valid: false, error: 'text cannot be empty' });
      expect(isNonEmptyString(5, 'text')).toEqual({ valid: false, error: 'text must be a string' });
    });
  });
});

describe('Result helpers', () => {
  it('should collect errors through check', () => {
    const errors: ValidationError[] = [];

    expect(check(isValidPort, '8080', 'port', errors)).toBe(8080);
    expect(check(isValidSeed, 'x', 'seed', errors)).toBeUndefined();

    expect(errors).toEqual([{ field: 'seed', message: 'seed must be a number', value: 'x' }]);
  });

  it('should format validation failures', () => {
    const result = validationError([
      { field: 'seed', message: 'seed must be a number' },
      { field: 'port', message: 'port must be an integer' },
    ]);

    expect(result).toEqual({
      success: false,
      error: 'Validation failed:\n  - seed: seed must be a number\n  - port: port must be an integer',
    });
  });

  it('should format missing arguments with usage', () => {
    expect(missingArgError('text', 'cortex ask <text...>')).toEqual({
      success: false,
      error: 'Missing required argument: text\nUsage: cortex ask <text...>',
    });
  });
});
