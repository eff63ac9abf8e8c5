import path from 'path';
import type { Brand } from '../runtime/brand.js';
import type { Result } from '../runtime/result.js';
import { ok, err } from '../runtime/result.js';
import { Err } from '../errors/factories.js';
import type { OutsideJailError } from '../errors/app-error.js';

/**
 * Path confinement for everything served over HTTP.
 *
 * Request paths are `/`-separated and already URL-decoded. They are
 * normalized *before* the containment check, so `..` segments can never
 * climb out of the jail.
 */

/** Absolute, normalized directory every request path is confined to. */
export type JailRoot = Brand<string, 'JailRoot'>;

export function toJailRoot(dir: string): JailRoot {
  const resolved = path.resolve(dir);
  const root = path.parse(resolved).root;
  const trimmed = resolved.length > root.length ? resolved.replace(/[\\/]+$/, '') : resolved;
  return trimmed as JailRoot;
}

export function isWithin(jailRoot: string, absolutePath: string): boolean {
  if (absolutePath === jailRoot) return true;
  const prefix = jailRoot.endsWith(path.sep) ? jailRoot : jailRoot + path.sep;
  return absolutePath.startsWith(prefix);
}

export function resolve(jailRoot: JailRoot, relativePath: string): Result<string, OutsideJailError> {
  if (relativePath.includes('\0')) {
    return err(Err.outsideJail(relativePath));
  }

  const hostRelative = relativePath.replace(/^\/+/, '').split('/').join(path.sep);
  const normalized = path.normalize(hostRelative === '' ? '.' : hostRelative);
  const candidate = path.join(jailRoot, normalized);
  const absolute = candidate.length > jailRoot.length ? candidate.replace(/[\\/]+$/, '') : candidate;

  return isWithin(jailRoot, absolute) ? ok(absolute) : err(Err.outsideJail(relativePath));
}

export function relativize(jailRoot: JailRoot, absolutePath: string): Result<string, OutsideJailError> {
  if (absolutePath === jailRoot) return ok('');
  if (!isWithin(jailRoot, absolutePath)) {
    return err(Err.outsideJail(absolutePath));
  }
  const skip = jailRoot.endsWith(path.sep) ? jailRoot.length : jailRoot.length + 1;
  return ok(absolutePath.slice(skip).split(path.sep).join('/'));
}
