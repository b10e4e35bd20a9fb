import { describe, expect, it } from 'vitest';
import { formatBn, formatMm, formatMultiple, formatPct, formatSignedPct } from './formatters';

describe('formatters', () => {
  it('switches from £mm to £bn at one thousand', () => {
    expect(formatMm(999.94)).toBe('£999.9mm');
    expect(formatMm(2500)).toBe('£2.50bn');
    expect(formatMm(-1500)).toBe('£-1.50bn');
    expect(formatBn(47000, 1)).toBe('£47.0bn');
  });

  it('formats ratios', () => {
    expect(formatPct(0.05)).toBe('5.00%');
    expect(formatSignedPct(0.1, 1)).toBe('+10.0%');
    expect(formatSignedPct(-0.5, 1)).toBe('-50.0%');
    expect(formatMultiple(1.5)).toBe('1.50x');
  });

  it('falls back on non-finite input', () => {
    expect(formatMm(Number.NaN)).toBe('N/A');
    expect(formatBn(Number.POSITIVE_INFINITY)).toBe('N/A');
    expect(formatSignedPct(Number.NaN, 1, '-')).toBe('-');
  });
});
