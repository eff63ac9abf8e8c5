/**
 * Serve Command
 *
 * Validates arguments, builds the configuration and starts the HTTP server.
 * Pure function with dependency injection.
 */

import path from 'path';
import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { ConfigOverrides, LoadConfigOptions, LoadConfigResult, ValidatedConfig } from '../../config/app-config.js';
import type { ConfigInvalidError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import { formatPath } from '../output-formatter.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ServeArguments {
  readonly host?: string;
  readonly port?: string;
}

/** Parsed commander options. `directoryDownload` is false only for `--no-directory-download`. */
export interface ServeOptions {
  readonly directory?: string;
  readonly initial?: string;
  readonly removable?: string;
  readonly upload?: string;
  readonly exclude?: readonly string[];
  readonly excludeFrom?: readonly string[];
  readonly compression?: string;
  readonly bufferSize?: string;
  readonly directoryDownload?: boolean;
}

export interface ServeCommandDeps {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
  readonly isDirectory: (absolutePath: string) => Promise<boolean>;
  readonly isFile: (absolutePath: string) => Promise<boolean>;
  readonly readPatternFiles: (files: readonly string[]) => ResultAsync<string[], ConfigInvalidError>;
  readonly loadConfig: (options: LoadConfigOptions) => LoadConfigResult;
  readonly startServer: (config: ValidatedConfig) => Promise<string>;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Resolves once the server listens. The server keeps the process alive; the
 * composition root owns shutdown.
 */
export async function executeServeCommand(
  args: ServeArguments,
  options: ServeOptions,
  deps: ServeCommandDeps
): Promise<CliResult> {
  const port = parseInteger(args.port);
  if (port === null) {
    return misuse(`Invalid port: ${String(args.port)}`, ['Use a number between 0 and 65535']);
  }
  const bufferSize = parseInteger(options.bufferSize);
  if (bufferSize === null) {
    return misuse(`Invalid buffer size: ${String(options.bufferSize)}`);
  }

  const directories = {
    directory: absolute(options.directory, deps.cwd),
    initial: absolute(options.initial, deps.cwd),
    removable: absolute(options.removable, deps.cwd),
    upload: absolute(options.upload, deps.cwd),
  };
  for (const [flag, dir] of Object.entries(directories)) {
    if (dir !== undefined && !(await deps.isDirectory(dir))) {
      return misuse(`--${flag}: not a directory: ${dir}`);
    }
  }

  const excludeFrom = (options.excludeFrom ?? []).map((f) => path.resolve(deps.cwd, f));
  for (const file of excludeFrom) {
    if (!(await deps.isFile(file))) {
      return misuse(`--exclude-from: not a file: ${file}`);
    }
  }
  const fromFiles = await deps.readPatternFiles(excludeFrom);
  if (fromFiles.isErr()) {
    return failure(formatAppError(fromFiles.error));
  }

  const overrides: ConfigOverrides = {
    host: args.host,
    port,
    ...directories,
    exclude: [...(options.exclude ?? []), ...fromFiles.value],
    compression: options.compression,
    bufferSize,
    directoryDownload: options.directoryDownload === false ? false : undefined,
  };

  const config = deps.loadConfig({ env: deps.env, cwd: deps.cwd, overrides });
  if (config.kind === 'err') {
    return misuse(formatAppError(config.error));
  }

  try {
    const url = await deps.startServer(config.value);
    const details = [`Serving ${formatPath(config.value.paths.base)}`];
    if (config.value.paths.removable) details.push(`Removable: ${formatPath(config.value.paths.removable)}`);
    if (config.value.paths.upload) details.push(`Upload: ${formatPath(config.value.paths.upload)}`);
    return success({ message: `Listening on ${url}`, details });
  } catch (error) {
    return failure(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** `undefined` passes through; anything not a non-negative integer is `null`. */
function parseInteger(raw: string | undefined): number | undefined | null {
  if (raw === undefined) return undefined;
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

function absolute(dir: string | undefined, cwd: string): string | undefined {
  return dir === undefined ? undefined : path.resolve(cwd, dir);
}
