export type SortProperty = 'text' | 'size' | 'modified';

export interface ListingSort {
  readonly property: SortProperty;
  readonly reverse: boolean;
}

export const DEFAULT_SORT: ListingSort = { property: 'text', reverse: false };

/**
 * `"size"`, `"-modified"`, ... An unknown property falls back to `text`.
 */
export function parseSort(raw: string | undefined): ListingSort {
  if (!raw) return DEFAULT_SORT;
  const reverse = raw.startsWith('-');
  const name = reverse ? raw.slice(1) : raw;
  const property: SortProperty = name === 'size' || name === 'modified' ? name : 'text';
  return { property, reverse };
}

export function formatSort(sort: ListingSort): string {
  return `${sort.reverse ? '-' : ''}${sort.property}`;
}

export interface Sortable {
  readonly name: string;
  readonly isDirectory: boolean;
  readonly size: number;
  readonly mtimeMs: number;
}

/**
 * Directories first, then by the chosen property (name breaks ties).
 * Reversing flips the whole list, directories included.
 */
export function sortListing<T extends Sortable>(items: readonly T[], sort: ListingSort): T[] {
  const byProperty = (a: T, b: T): number => {
    switch (sort.property) {
      case 'size':
        return a.size - b.size;
      case 'modified':
        return a.mtimeMs - b.mtimeMs;
      case 'text':
        return compareStrings(a.name.toLowerCase(), b.name.toLowerCase());
    }
  };

  const sorted = [...items].sort((a, b) => {
    if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
    return byProperty(a, b) || compareStrings(a.name, b.name);
  });

  return sort.reverse ? sorted.reverse() : sorted;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
