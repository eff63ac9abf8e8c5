const BINARY_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB', 'ZiB', 'YiB'] as const;
const DECIMAL_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB'] as const;

/**
 * Human-readable size. A unit is kept while the value stays under 1000, so
 * 1000 bytes reads "0.98 KiB" in binary units rather than "1000 B".
 *
 *   formatSize(512)          // "512 B"
 *   formatSize(1024)         // "1.00 KiB"
 *   formatSize(1024, false)  // "1.02 KB"
 */
export function formatSize(bytes: number, binary = true): string {
  const units = binary ? BINARY_UNITS : DECIMAL_UNITS;
  const divider = binary ? 1024 : 1000;

  let size = bytes;
  for (let i = 0; i < units.length - 1; i++) {
    if (size < 1000) {
      return i === 0 ? `${Math.trunc(size)} ${units[i]}` : `${size.toFixed(2)} ${units[i]}`;
    }
    size /= divider;
  }
  return `${size.toFixed(2)} ${units[units.length - 1]}`;
}
