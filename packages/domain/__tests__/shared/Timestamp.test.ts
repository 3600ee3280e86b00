import { describe, expect, it } from 'vitest';
import { Timestamp } from '../../src/shared/vos/Timestamp';

describe('Timestamp', () => {
  it('creates from millis and exposes value', () => {
    const ts = Timestamp.fromMillis(1_700_000_000_000);
    expect(ts.value).toBe(1_700_000_000_000);
  });

  it('rejects non-finite millis', () => {
    expect(() => Timestamp.fromMillis(Number.NaN)).toThrow(
      'Timestamp must be a finite number of milliseconds'
    );
  });

  it('round-trips ISO strings', () => {
    const iso = '2025-01-02T03:04:05.000Z';
    expect(Timestamp.fromISOString(iso).toISOString()).toBe(iso);
    expect(() => Timestamp.fromISOString('invalid')).toThrow(
      'Timestamp is not a valid ISO date'
    );
  });

  it('compares by value', () => {
    const a = Timestamp.fromMillis(1);
    const b = Timestamp.fromMillis(2);
    expect(a.isBefore(b)).toBe(true);
    expect(a.equals(Timestamp.fromMillis(1))).toBe(true);
    expect(a.equals(b)).toBe(false);
  });
});
