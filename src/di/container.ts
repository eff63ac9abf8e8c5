import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import { lifecyclePolicyFor } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { InMemoryShutdownEvents } from '../runtime/adapters/in-memory-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { NodeFileSystem } from '../infrastructure/fs/node-file-system.js';
import { ExclusionPolicy } from '../application/services/exclusion-policy.js';
import { FileBrowserService } from '../application/services/file-browser-service.js';
import { HttpServer } from '../infrastructure/http/HttpServer.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let isInitializing = false;

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'server' };
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const policy = lifecyclePolicyFor(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  const signals: ProcessSignals =
    policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });

  container.register<ShutdownEvents>(DI.Runtime.ShutdownEvents, { useValue: new InMemoryShutdownEvents() });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // The CLI and tests register a config built from their own overrides first.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: process.env, cwd: process.cwd() });
  if (configResult.kind === 'err') {
    throw new Error(formatAppError(configResult.error));
  }
  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  container.register(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });

  // Tests may swap the file system for a fake.
  if (!container.isRegistered(DI.Infra.FileSystem)) {
    container.register(DI.Infra.FileSystem, {
      useFactory: instanceCachingFactory((c) => c.resolve(NodeFileSystem)),
    });
  }

  container.register(DI.Services.Exclusion, {
    useFactory: instanceCachingFactory((c) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new ExclusionPolicy(config.paths.base, config.exclude.patterns);
    }),
  });
  container.register(DI.Services.FileBrowser, {
    useFactory: instanceCachingFactory((c) => c.resolve(FileBrowserService)),
  });
  container.register(DI.Infra.HttpServer, {
    useFactory: instanceCachingFactory((c) => c.resolve(HttpServer)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container. Idempotent; a failed initialization is not
 * retried, the caller should exit.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;
  if (isInitializing) {
    throw new Error('[DI] Container initialization re-entered');
  }

  isInitializing = true;
  try {
    registerRuntime(options);
    registerConfig();
    registerServices();
    initialized = true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[DI] Container initialization failed: ${message}`, { cause: error });
  } finally {
    isInitializing = false;
  }
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  isInitializing = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
