/**
 * Application configuration: parse, don't validate.
 *
 * Three layers, later ones winning: built-in defaults, `FILEPANE_*`
 * environment variables, command-line overrides. Everything is checked by zod
 * at this boundary; failures come back as a `ConfigInvalid` value listing
 * every issue, never as a throw.
 */

import path from 'path';
import { z } from 'zod';
import type { Result } from '../runtime/result.js';
import { ok, err } from '../runtime/result.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { JailRoot } from '../utils/path-guard.js';
import { isWithin, toJailRoot } from '../utils/path-guard.js';
import type { CompressionMode } from '../infrastructure/archive/compression.js';
import { COMPRESSION_MODES, TAR_BLOCK_SIZE } from '../infrastructure/archive/compression.js';
import type { LogLevel } from '../core/logging/types.js';
import { LOG_LEVELS } from '../core/logging/types.js';

export interface AppConfig {
  readonly server: {
    readonly host: string;
    readonly port: number;
  };
  readonly paths: {
    /** Jail root: nothing outside it is ever served. */
    readonly base: JailRoot;
    readonly initial: JailRoot;
    readonly removable: JailRoot | null;
    readonly upload: JailRoot | null;
  };
  readonly exclude: {
    readonly patterns: readonly string[];
  };
  readonly archive: {
    readonly enabled: boolean;
    readonly compression: CompressionMode;
    readonly compressionLevel: number;
    readonly bufferSize: number;
  };
  readonly display: {
    readonly binaryUnits: boolean;
  };
  readonly logLevel: LogLevel;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

/** Values given on the command line; `undefined` means "not given". */
export interface ConfigOverrides {
  readonly host?: string;
  readonly port?: number;
  readonly directory?: string;
  readonly initial?: string;
  readonly removable?: string;
  readonly upload?: string;
  readonly exclude?: readonly string[];
  readonly compression?: string;
  readonly bufferSize?: number;
  readonly directoryDownload?: boolean;
}

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
  readonly overrides?: ConfigOverrides;
}

export const CONFIG_DEFAULTS = {
  host: '127.0.0.1',
  port: 8080,
  compression: 'gzip',
  compressionLevel: 1,
  bufferSize: 262_144,
  directoryDownload: true,
  binaryUnits: true,
  logLevel: 'info',
} as const;

// =============================================================================
// Schemas
// =============================================================================

const integerString = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform(Number);

const booleanString = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .transform((v) => v === '1' || v === 'true' || v === 'yes' || v === 'on');

const optionalPath = z.string().trim().min(1).optional();

const EnvSchema = z.object({
  FILEPANE_HOST: z.string().trim().min(1).optional(),
  FILEPANE_PORT: integerString.optional(),
  FILEPANE_DIRECTORY: optionalPath,
  FILEPANE_INITIAL: optionalPath,
  FILEPANE_REMOVABLE: optionalPath,
  FILEPANE_UPLOAD: optionalPath,
  FILEPANE_EXCLUDE: z.string().optional(),
  FILEPANE_TAR_COMPRESSION: z.string().optional(),
  FILEPANE_TAR_COMPRESSLEVEL: integerString.optional(),
  FILEPANE_TAR_BUFFSIZE: integerString.optional(),
  FILEPANE_DIRECTORY_DOWNLOADABLE: booleanString.optional(),
  FILEPANE_BINARY_UNITS: booleanString.optional(),
  FILEPANE_LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
});

const SettingsSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(0, 'Port must be >= 0').max(65535, 'Port must be <= 65535'),
    directory: z.string().min(1),
    initial: z.string().min(1).optional(),
    removable: z.string().min(1).optional(),
    upload: z.string().min(1).optional(),
    exclude: z.array(z.string().min(1)),
    compression: z.enum(COMPRESSION_MODES),
    compressionLevel: z.number().int().min(0).max(9),
    bufferSize: z.number().int().positive('Buffer size must be positive'),
    directoryDownload: z.boolean(),
    binaryUnits: z.boolean(),
    logLevel: z.enum(LOG_LEVELS),
  })
  .superRefine((s, ctx) => {
    if (s.compression !== 'none' && s.bufferSize % TAR_BLOCK_SIZE !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bufferSize'],
        message: `Must be a multiple of ${TAR_BLOCK_SIZE} when compression is ${s.compression}`,
      });
    }
    if (s.compression === 'bzip2' && s.compressionLevel < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['compressionLevel'],
        message: 'bzip2 levels range from 1 to 9',
      });
    }
  });

type Settings = z.infer<typeof SettingsSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const env = EnvSchema.safeParse(options.env);
  if (!env.success) {
    return err(Err.configInvalid(toConfigIssues(env.error)));
  }

  const o = options.overrides ?? {};
  const e = env.data;
  const settings = SettingsSchema.safeParse({
    host: o.host ?? e.FILEPANE_HOST ?? CONFIG_DEFAULTS.host,
    port: o.port ?? e.FILEPANE_PORT ?? CONFIG_DEFAULTS.port,
    directory: o.directory ?? e.FILEPANE_DIRECTORY ?? options.cwd,
    initial: o.initial ?? e.FILEPANE_INITIAL,
    removable: o.removable ?? e.FILEPANE_REMOVABLE,
    upload: o.upload ?? e.FILEPANE_UPLOAD,
    exclude: o.exclude && o.exclude.length > 0 ? [...o.exclude] : splitPatterns(e.FILEPANE_EXCLUDE),
    compression: o.compression ?? e.FILEPANE_TAR_COMPRESSION ?? CONFIG_DEFAULTS.compression,
    compressionLevel: e.FILEPANE_TAR_COMPRESSLEVEL ?? CONFIG_DEFAULTS.compressionLevel,
    bufferSize: o.bufferSize ?? e.FILEPANE_TAR_BUFFSIZE ?? CONFIG_DEFAULTS.bufferSize,
    directoryDownload: o.directoryDownload ?? e.FILEPANE_DIRECTORY_DOWNLOADABLE ?? CONFIG_DEFAULTS.directoryDownload,
    binaryUnits: e.FILEPANE_BINARY_UNITS ?? CONFIG_DEFAULTS.binaryUnits,
    logLevel: e.FILEPANE_LOG_LEVEL ?? CONFIG_DEFAULTS.logLevel,
  });
  if (!settings.success) {
    return err(Err.configInvalid(toConfigIssues(settings.error)));
  }

  return buildConfig(settings.data, options.cwd);
}

/**
 * Tests and local construction only: brands a hand-built config as validated.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function splitPatterns(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function buildConfig(s: Settings, cwd: string): LoadConfigResult {
  const issues: ConfigIssue[] = [];
  const base = toJailRoot(path.resolve(cwd, s.directory));

  const nested = (key: 'initial' | 'removable' | 'upload', raw: string | undefined): JailRoot | null => {
    if (raw === undefined) return null;
    const dir = toJailRoot(path.resolve(cwd, raw));
    if (!isWithin(base, dir)) {
      issues.push({ path: key, message: `${dir} is not inside ${base}` });
    }
    return dir;
  };

  const initial = nested('initial', s.initial) ?? base;
  const removable = nested('removable', s.removable);
  const upload = nested('upload', s.upload);

  if (issues.length > 0) {
    return err(Err.configInvalid(issues));
  }

  const config: AppConfig = {
    server: { host: s.host, port: s.port },
    paths: { base, initial, removable, upload },
    exclude: { patterns: s.exclude },
    archive: {
      enabled: s.directoryDownload,
      compression: s.compression,
      compressionLevel: s.compressionLevel,
      bufferSize: s.bufferSize,
    },
    display: { binaryUnits: s.binaryUnits },
    logLevel: s.logLevel,
  };
  return ok(createValidatedConfig(config));
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
