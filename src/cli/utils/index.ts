/**
 * CLI Utils - Export all utility modules
 */

export { formatHeader, formatElapsed, renderResult, formatOutput } from './helpers.js';

export {
  type ValidationError,
  type FieldCheck,
  type FieldValidator,
  numberInRange,
  integerInRange,
  isValidSeed,
  isValidStepCount,
  isValidPort,
  isValidStrength,
  isNonEmptyString,
  check,
  validationError,
  missingArgError,
} from './validators.js';
