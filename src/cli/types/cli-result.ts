/**
 * Command outcomes. Commands return these; the composition root prints them
 * and picks the exit code.
 */

import type { ExitCode } from '../../runtime/ports/process-terminator.js';

export interface CliOutput {
  readonly message: string;
  /** One line each, printed as a bullet list under the message. */
  readonly details?: readonly string[];
}

export type CliFailureCode = Exclude<ExitCode, { kind: 'success' }>;

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: CliFailureCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(message: string, exitCode: CliFailureCode = { kind: 'failure' }): CliResult {
  return { kind: 'failure', exitCode, output: { message } };
}

/** Bad arguments: exits with 2. */
export function misuse(message: string): CliResult {
  return failure(message, { kind: 'misuse' });
}
