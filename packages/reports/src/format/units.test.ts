import { describe, expect, it } from 'vitest';
import { formatBytes, formatUptime } from './units.js';

describe('formatBytes', () => {
  it('keeps small values in bytes', () => {
    expect(formatBytes(0)).toBe('0.00 B');
    expect(formatBytes(512)).toBe('512.00 B');
  });

  it('scales by powers of 1024', () => {
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(8 * 1024 ** 3)).toBe('8.00 GB');
    expect(formatBytes(1024 ** 4)).toBe('1.00 TB');
  });

  it('stops at petabytes', () => {
    expect(formatBytes(2 * 1024 ** 5)).toBe('2.00 PB');
    expect(formatBytes(2048 * 1024 ** 5)).toBe('2048.00 PB');
  });

  it('treats a non-finite size as zero', () => {
    expect(formatBytes(Number.NaN)).toBe('0.00 B');
  });
});

describe('formatUptime', () => {
  it('shows 0m below one minute', () => {
    expect(formatUptime(0)).toBe('0m');
    expect(formatUptime(59)).toBe('0m');
  });

  it('drops zero components', () => {
    expect(formatUptime(3600)).toBe('1h');
    expect(formatUptime(172_800)).toBe('2d');
    expect(formatUptime(86_400 + 120)).toBe('1d 2m');
  });

  it('combines days, hours and minutes', () => {
    expect(formatUptime(90_061)).toBe('1d 1h 1m');
  });
});
