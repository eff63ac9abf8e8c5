import { describe, it, expect } from 'vitest';
import { DEFAULT_SORT, formatSort, parseSort, sortListing } from '../../../src/application/services/listing-sort.js';

const items = [
  { name: 'beta.txt', isDirectory: false, size: 30, mtimeMs: 1 },
  { name: 'Alpha.txt', isDirectory: false, size: 10, mtimeMs: 3 },
  { name: 'zeta', isDirectory: true, size: 0, mtimeMs: 2 },
  { name: 'docs', isDirectory: true, size: 0, mtimeMs: 5 },
  { name: 'gamma.bin', isDirectory: false, size: 20, mtimeMs: 2 },
];

const names = (sorted: readonly { name: string }[]): string[] => sorted.map((i) => i.name);

describe('parseSort', () => {
  it('defaults to name ascending', () => {
    expect(parseSort(undefined)).toEqual(DEFAULT_SORT);
    expect(parseSort('')).toEqual(DEFAULT_SORT);
  });

  it('reads a leading dash as reverse', () => {
    expect(parseSort('-size')).toEqual({ property: 'size', reverse: true });
    expect(parseSort('modified')).toEqual({ property: 'modified', reverse: false });
  });

  it('falls back to text for unknown properties', () => {
    expect(parseSort('-color')).toEqual({ property: 'text', reverse: true });
  });

  it('round-trips through formatSort', () => {
    expect(formatSort(parseSort('-modified'))).toBe('-modified');
    expect(formatSort(parseSort('nonsense'))).toBe('text');
  });
});

describe('sortListing', () => {
  it('lists directories first, names case-insensitively', () => {
    expect(names(sortListing(items, parseSort('text')))).toEqual([
      'docs',
      'zeta',
      'Alpha.txt',
      'beta.txt',
      'gamma.bin',
    ]);
  });

  it('sorts by size with the name as tiebreaker', () => {
    expect(names(sortListing(items, parseSort('size')))).toEqual([
      'docs',
      'zeta',
      'Alpha.txt',
      'gamma.bin',
      'beta.txt',
    ]);
  });

  it('sorts by modification time', () => {
    expect(names(sortListing(items, parseSort('modified')))).toEqual([
      'zeta',
      'docs',
      'beta.txt',
      'gamma.bin',
      'Alpha.txt',
    ]);
  });

  it('reverses the whole list, directories last', () => {
    expect(names(sortListing(items, parseSort('-text')))).toEqual([
      'gamma.bin',
      'beta.txt',
      'Alpha.txt',
      'zeta',
      'docs',
    ]);
  });

  it('does not mutate its input', () => {
    const before = names(items);
    sortListing(items, parseSort('-size'));
    expect(names(items)).toEqual(before);
  });
});
