/**
 * CLI Types - Public API
 */

export type { CliOutput, CliResult, CliFailureCode } from './cli-result.js';
export { success, failure, misuse } from './cli-result.js';
