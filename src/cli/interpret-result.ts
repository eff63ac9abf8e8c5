/**
 * Bridges CLI command results to process termination.
 * This is the only place where a CliResult becomes a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult, type ResultPrinter } from './output-formatter.js';

export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator,
  print: ResultPrinter = printResult
): void {
  print(result);

  switch (result.kind) {
    case 'success':
      // Don't exit: a started server keeps the process alive.
      return;

    case 'failure':
      terminator.terminate(result.exitCode);
  }
}
