import { describe, it, expect } from 'vitest';
import { formatSize } from '../../../src/utils/format-size.js';

describe('formatSize', () => {
  it('prints bytes without decimals', () => {
    expect(formatSize(0)).toBe('0 B');
    expect(formatSize(512)).toBe('512 B');
    expect(formatSize(999)).toBe('999 B');
  });

  it('uses binary units by default', () => {
    expect(formatSize(1024)).toBe('1.00 KiB');
    expect(formatSize(1024 * 1024)).toBe('1.00 MiB');
    expect(formatSize(1536)).toBe('1.50 KiB');
  });

  it('moves to the next unit from 1000 on', () => {
    expect(formatSize(1000)).toBe('0.98 KiB');
  });

  it('supports decimal units', () => {
    expect(formatSize(1024, false)).toBe('1.02 KB');
    expect(formatSize(1000, false)).toBe('1.00 KB');
    expect(formatSize(2_500_000, false)).toBe('2.50 MB');
  });
});
