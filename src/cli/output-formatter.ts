/**
 * Presentation layer for CLI output.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export type ResultPrinter = (result: CliResult) => void;

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`✖ ${output.message}`) : chalk.green(`✔ ${output.message}`));

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);
  }
}

/**
 * Failures go to stderr, everything else to stdout.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (formatted) {
    if (result.kind === 'failure') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }
}

export function formatPath(path: string): string {
  return chalk.cyan(path);
}
