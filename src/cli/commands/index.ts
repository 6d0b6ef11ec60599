/**
 * CLI Commands - Export all command modules
 */

export { cmdAsk } from './ask.js';
export { cmdBrain } from './brain.js';
export { cmdValidate } from './validate.js';
