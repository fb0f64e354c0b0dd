import { describe, it, expect } from 'vitest';
import { formatFileStamp, formatTimestamp } from './timestamp.js';

describe('formatTimestamp', () => {
  it('should pad every component to two digits', () => {
    const date = new Date(2024, 0, 5, 9, 3, 7);
    expect(formatTimestamp(date)).toBe('2024-01-05 09:03:07');
  });

  it('should keep two-digit components as they are', () => {
    const date = new Date(2023, 11, 31, 23, 59, 58);
    expect(formatTimestamp(date)).toBe('2023-12-31 23:59:58');
  });
});

describe('formatFileStamp', () => {
  it('should produce a compact stamp without separators', () => {
    const date = new Date(2024, 0, 5, 9, 3, 7);
    expect(formatFileStamp(date)).toBe('20240105_090307');
  });
});
