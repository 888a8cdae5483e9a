import { describe, it, expect } from 'vitest';
import { LocalDateTime } from '../src/local-date-time.js';

describe('LocalDateTime', () => {
  it('round-trips full date-time text', () => {
    expect(LocalDateTime.parse('2000-01-01T00:00:00').toString()).toBe('2000-01-01T00:00:00');
    expect(LocalDateTime.parse('2999-12-31T23:59:59').toString()).toBe('2999-12-31T23:59:59');
  });

  it('always writes seconds', () => {
    expect(LocalDateTime.parse('2000-01-01T10:15').toString()).toBe('2000-01-01T10:15:00');
  });

  it('writes the fraction without trailing zeros', () => {
    expect(LocalDateTime.parse('2024-02-29T12:00:00.120').toString()).toBe('2024-02-29T12:00:00.12');
    expect(LocalDateTime.parse('2024-02-29T12:00:00.000').toString()).toBe('2024-02-29T12:00:00');
  });

  it.each([
    '2023-02-29T00:00:00',
    '2000-13-01T00:00:00',
    '2000-04-31T00:00:00',
    '2000-01-01T24:00:00',
    '2000-01-01 00:00:00',
    '2000-01-01T00:00:00Z',
    '2000-01-01',
  ])('rejects %j', (text) => {
    expect(() => LocalDateTime.parse(text)).toThrow(RangeError);
  });

  it('pins the wall-clock reading to UTC', () => {
    expect(LocalDateTime.parse('2999-12-31T23:59:59').toDate().toISOString()).toBe('2999-12-31T23:59:59.000Z');
    expect(LocalDateTime.parse('2000-01-01T00:00:00.500').toDate().toISOString()).toBe('2000-01-01T00:00:00.500Z');
  });

  it('keeps two-digit years literal', () => {
    expect(LocalDateTime.parse('0099-01-01T00:00:00').toDate().toISOString()).toBe('0099-01-01T00:00:00.000Z');
  });

  it('builds from fields', () => {
    const value = LocalDateTime.of({ year: 2020, month: 6, day: 15, hour: 8, minute: 30 });
    expect(value.toString()).toBe('2020-06-15T08:30:00');
    expect(value.equals(LocalDateTime.parse('2020-06-15T08:30'))).toBe(true);
    expect(Object.isFrozen(value)).toBe(true);
  });
});
