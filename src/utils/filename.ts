import type { Brand } from '../runtime/brand.js';

export type SanitizedFilename = Brand<string, 'SanitizedFilename'>;

export type TargetOs = NodeJS.Platform;

/** Filesystem filename encodings; the narrow ones force replacement. */
export type FilenameEncoding = 'utf8' | 'ascii' | 'latin1';

export interface SanitizeOptions {
  readonly targetOs?: TargetOs;
  readonly encoding?: FilenameEncoding;
}

const RESERVED_NAMES: ReadonlySet<string> = new Set(['', '.', '..', '::']);

const WINDOWS_DEVICE_NAMES: ReadonlySet<string> = new Set([
  'CON',
  'PRN',
  'AUX',
  'NUL',
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);

// Unpaired halves cannot be written as UTF-8 or any narrower encoding.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

const MAX_CODE_POINT: Readonly<Record<FilenameEncoding, number>> = {
  utf8: 0x10ffff,
  ascii: 0x7f,
  latin1: 0xff,
};

/**
 * Reduces an untrusted name (typically from an upload) to a single safe path
 * component. Returns `""` when nothing usable is left; callers treat that as
 * an invalid filename.
 *
 * Idempotent.
 */
export function sanitizeFilename(raw: string, options: SanitizeOptions = {}): SanitizedFilename {
  const targetOs = options.targetOs ?? process.platform;
  const encoding = options.encoding ?? 'utf8';

  const lastComponent = raw.split(/[\\/]/).pop() ?? '';
  let name = lastComponent.replace(/[\\/\0]/g, '_').replace(LONE_SURROGATE, '_');

  const limit = MAX_CODE_POINT[encoding];
  if (limit < MAX_CODE_POINT.utf8) {
    name = Array.from(name, (ch) => ((ch.codePointAt(0) ?? 0) > limit ? '_' : ch)).join('');
  }

  if (RESERVED_NAMES.has(name)) return asSanitized('');
  if (targetOs === 'win32') {
    const stem = name.split('.', 1)[0] ?? '';
    if (WINDOWS_DEVICE_NAMES.has(stem.toUpperCase())) return asSanitized('');
  }

  return asSanitized(name);
}

function asSanitized(name: string): SanitizedFilename {
  return name as SanitizedFilename;
}

const RANDOM_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export interface FilenameParts {
  readonly base: string;
  readonly ext: string;
}

/**
 * Splits on the last two dots at most: `archive.tar.gz` gives
 * `archive` + `.tar.gz`, `a.b.c.d` gives `a.b` + `.c.d`.
 */
export function splitFilename(name: string): FilenameParts {
  const parts = name.split('.');
  if (parts.length <= 1) return { base: name, ext: '' };
  const extParts = parts.splice(Math.max(1, parts.length - 2));
  return { base: parts.join('.'), ext: extParts.map((p) => `.${p}`).join('') };
}

export function alternativeFilename(name: string, attempt?: number, random: () => number = Math.random): string {
  const { base, ext } = splitFilename(name);
  const extra =
    attempt === undefined
      ? ` ${Array.from({ length: 8 }, () => RANDOM_ALPHABET[Math.floor(random() * RANDOM_ALPHABET.length)]).join('')}`
      : ` (${attempt})`;
  return `${base}${extra}${ext}`;
}

export type ExistsFn = (name: string) => boolean | Promise<boolean>;

/**
 * Returns `desiredName` when free, otherwise the first free
 * `"<base> (n).<ext>"` for n in 2..maxAttempts, then random suffixes until
 * one is free.
 */
export async function chooseNonCollidingName(
  exists: ExistsFn,
  desiredName: string,
  maxAttempts = 999,
  random: () => number = Math.random
): Promise<string> {
  if (!(await exists(desiredName))) return desiredName;

  for (let attempt = 2; attempt <= maxAttempts; attempt++) {
    const candidate = alternativeFilename(desiredName, attempt);
    if (!(await exists(candidate))) return candidate;
  }

  for (;;) {
    const candidate = alternativeFilename(desiredName, undefined, random);
    if (!(await exists(candidate))) return candidate;
  }
}
