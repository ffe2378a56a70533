import { describe, it, expect } from 'vitest';
import { normalizePublishedDate } from './datetime';

describe('normalizePublishedDate', () => {
  it('keeps ISO timestamps with their offset', () => {
    expect(normalizePublishedDate('2024-12-31T10:00:00+01:00')).toBe('2024-12-31T10:00:00+01:00');
  });

  it('reduces date-only values to yyyy-MM-dd', () => {
    expect(normalizePublishedDate('2024-12-31')).toBe('2024-12-31');
    expect(normalizePublishedDate('31-12-2024')).toBe('2024-12-31');
    expect(normalizePublishedDate('1/1/2025')).toBe('2025-01-01');
  });

  it('parses Dutch month names', () => {
    expect(normalizePublishedDate('31 december 2024')).toBe('2024-12-31');
    expect(normalizePublishedDate('dinsdag 31 december 2024 om 14:30')).toBe('2024-12-31T14:30:00+01:00');
  });

  it('returns undefined for text without a date', () => {
    expect(normalizePublishedDate('gisteren')).toBeUndefined();
    expect(normalizePublishedDate('   ')).toBeUndefined();
  });
});
