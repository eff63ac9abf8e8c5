import path from 'path';
import fs from 'fs/promises';
import ignore from 'ignore';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { ConfigInvalidError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { JailRoot } from '../../utils/path-guard.js';
import { isWithin, relativize } from '../../utils/path-guard.js';
import type { ExcludePredicate } from '../../infrastructure/archive/directory-walker.js';
import type { FileSystemPort } from '../ports/file-system.port.js';

/**
 * Decides which nodes under the base directory are invisible.
 *
 * Patterns use gitignore syntax relative to the base: `/build` only matches
 * the top-level `build`, `*.pyc` matches at any depth, `logs/` only matches
 * directories and `!keep.pyc` re-includes. Matching is case-sensitive. A node
 * is excluded when it or any of its ancestors matches.
 */
export class ExclusionPolicy {
  private readonly matcher: ReturnType<typeof ignore>;
  private readonly patternCount: number;

  constructor(
    private readonly base: JailRoot,
    patterns: readonly string[]
  ) {
    const cleaned = patterns.map((p) => p.trim()).filter((p) => p.length > 0);
    this.patternCount = cleaned.length;
    this.matcher = ignore({ ignorecase: false }).add(cleaned);
  }

  get isEmpty(): boolean {
    return this.patternCount === 0;
  }

  /**
   * Pattern check only. Paths outside the base are always excluded.
   */
  isExcluded(absolutePath: string, isDirectory = false): boolean {
    const rel = relativize(this.base, absolutePath);
    if (rel.kind === 'err') return true;
    if (rel.value === '' || this.isEmpty) return false;
    return this.matcher.ignores(isDirectory ? `${rel.value}/` : rel.value);
  }

  /**
   * Pattern check plus symlink resolution: a link whose target lies outside
   * the base, or is itself excluded, is excluded too.
   */
  async isExcludedFollowingLinks(absolutePath: string, fileSystem: FileSystemPort, isDirectory = false): Promise<boolean> {
    if (this.isExcluded(absolutePath, isDirectory)) return true;
    const real = await fileSystem.realpath(absolutePath);
    if (real.isErr()) return real.error._tag !== 'NotFound';
    if (real.value === absolutePath) return false;
    const realBase = await fileSystem.realpath(this.base);
    const base = realBase.isOk() ? realBase.value : this.base;
    if (!isWithin(base, real.value)) return true;
    return this.isExcluded(path.join(this.base, path.relative(base, real.value)), isDirectory);
  }

  /** Predicate for the archive walker, which never follows links. */
  toPredicate(): ExcludePredicate | undefined {
    if (this.isEmpty) return undefined;
    return (absolutePath, isDirectory) => this.isExcluded(absolutePath, isDirectory);
  }
}

/**
 * One pattern per line; `#` starts a comment, anywhere on the line; blank
 * lines are ignored.
 */
export function parsePatternFile(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => (line.split('#', 1)[0] ?? '').trim())
    .filter((line) => line.length > 0);
}

export function readPatternFiles(files: readonly string[]): ResultAsync<string[], ConfigInvalidError> {
  return RA.combine(
    files.map((file) =>
      RA.fromPromise(fs.readFile(file, 'utf8'), (e) =>
        Err.configInvalid([
          { path: 'excludeFrom', message: `Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}` },
        ])
      ).map(parsePatternFile)
    )
  ).map((lists) => lists.flat());
}
