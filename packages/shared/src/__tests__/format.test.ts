/**
 * Formatting Helper Tests
 */

import { humanizeSize } from '../format/humanize.js';
import { parseRfc3339, formatClock, parseDuration } from '../format/time.js';

describe('humanizeSize', () => {
  it('should print small values in bytes', () => {
    expect(humanizeSize(0)).toBe('0 B');
    expect(humanizeSize(1023)).toBe('1023 B');
  });

  it('should scale to binary units', () => {
    expect(humanizeSize(1536)).toBe('1.5 KiB');
    expect(humanizeSize(1024 ** 3)).toBe('1 GiB');
    expect(humanizeSize(5 * 1024 ** 4 + 256 * 1024 ** 3)).toBe('5.25 TiB');
  });
});

describe('parseRfc3339', () => {
  it('should parse zulu and offset timestamps', () => {
    expect(parseRfc3339('2024-03-01T10:00:00Z')?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(parseRfc3339('2024-03-01T12:00:00+02:00')?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  it('should reject non RFC 3339 values', () => {
    expect(parseRfc3339('2024-03-01')).toBeUndefined();
    expect(parseRfc3339('yesterday')).toBeUndefined();
    expect(parseRfc3339('')).toBeUndefined();
    expect(parseRfc3339(undefined)).toBeUndefined();
  });
});

describe('formatClock', () => {
  it('should zero-pad local time', () => {
    expect(formatClock(new Date(2024, 0, 1, 7, 5, 9))).toBe('07:05:09');
  });
});

describe('parseDuration', () => {
  it('should parse duration strings', () => {
    expect(parseDuration('3s')).toBe(3000);
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('1m30s')).toBe(90_000);
    expect(parseDuration('1.5s')).toBe(1500);
    expect(parseDuration('10')).toBe(10_000);
  });

  it('should reject malformed durations', () => {
    expect(parseDuration('')).toBeUndefined();
    expect(parseDuration('3x')).toBeUndefined();
    expect(parseDuration('s3')).toBeUndefined();
    expect(parseDuration('3s extra')).toBeUndefined();
  });
});
