#!/usr/bin/env node
/**
 * filepane CLI - Composition Root
 *
 * Wires dependencies for the serve command, interprets its CliResult and
 * owns signal-driven shutdown. No business logic lives here.
 */

import 'reflect-metadata';
import { Command } from 'commander';
import fs from 'fs/promises';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ValidatedConfig } from './config/app-config.js';
import { loadConfig } from './config/app-config.js';
import { readPatternFiles } from './application/services/exclusion-policy.js';
import type { HttpServer } from './infrastructure/http/HttpServer.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import type { ProcessSignals } from './runtime/ports/process-signals.js';
import type { ShutdownEvents } from './runtime/ports/shutdown-events.js';
import { getBootstrapLogger } from './core/logging/index.js';
import { COMPRESSION_MODES } from './infrastructure/archive/compression.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { executeServeCommand, type ServeOptions } from './cli/commands/index.js';

const VERSION = '0.1.0';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('filepane')
  .description('Serve a directory tree over HTTP: browse, download, upload')
  .version(VERSION)
  .argument('[host]', 'address to listen on (default 127.0.0.1)')
  .argument('[port]', 'port to listen on (default 8080, 0 picks a free one)')
  .option('--directory <path>', 'base directory served (default: current directory)')
  .option('--initial <path>', 'directory shown first (default: base directory)')
  .option('--removable <path>', 'allow removing files and directories under this path')
  .option('--upload <path>', 'allow uploads and new directories under this path')
  .option('--exclude <pattern>', 'hide paths matching this glob (repeatable)', collect, [])
  .option('--exclude-from <file>', 'read exclude patterns from a file (repeatable)', collect, [])
  .option('--compression <mode>', `archive compression: ${COMPRESSION_MODES.join(', ')}`)
  .option('--buffer-size <bytes>', 'archive buffer size in bytes')
  .option('--no-directory-download', 'disable directory archive downloads')
  .action(async (host: string | undefined, port: string | undefined, options: ServeOptions) => {
    // The container needs the config, which needs the arguments: terminate directly until then.
    let terminator: ProcessTerminator = new NodeProcessTerminator();

    const result = await executeServeCommand({ host, port }, options, {
      env: process.env,
      cwd: process.cwd(),
      isDirectory: (p) => fs.stat(p).then((s) => s.isDirectory(), () => false),
      isFile: (p) => fs.stat(p).then((s) => s.isFile(), () => false),
      readPatternFiles,
      loadConfig,
      startServer: async (config) => {
        container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
        initializeContainer({ runtimeMode: { kind: 'server' } });
        terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
        const server = container.resolve<HttpServer>(DI.Infra.HttpServer);
        const url = await server.start();
        installShutdown(server, terminator);
        return url;
      },
    });

    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════

function installShutdown(server: HttpServer, terminator: ProcessTerminator): void {
  const signals = container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals);
  const events = container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents);
  const logger = getBootstrapLogger();

  signals.once('SIGINT', () => events.emit({ kind: 'shutdown_requested', signal: 'SIGINT' }));
  signals.once('SIGTERM', () => events.emit({ kind: 'shutdown_requested', signal: 'SIGTERM' }));

  const unsubscribe = events.onShutdown((event) => {
    unsubscribe();
    logger.info({ signal: event.signal }, 'shutting down');
    void server.stop().then(
      () => terminator.terminate({ kind: 'success' }),
      (error: unknown) => {
        logger.error({ err: error }, 'shutdown failed');
        terminator.terminate({ kind: 'failure' });
      }
    );
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

void program.parseAsync(process.argv).catch((error: unknown) => {
  getBootstrapLogger().fatal({ err: error }, 'filepane failed');
  process.exitCode = 1;
});
