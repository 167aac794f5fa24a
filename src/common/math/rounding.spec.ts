import { clamp, formatAmount, roundTo } from './rounding';

describe('rounding helpers', () => {
  it('rounds to the requested precision', () => {
    expect(roundTo(90.90909, 1)).toBe(90.9);
    expect(roundTo(0.12345, 3)).toBe(0.123);
    expect(roundTo(2.857142, 2)).toBe(2.86);
  });

  it('rounds the stored binary value, not its decimal spelling', () => {
    // 625.005 and 6.255 are stored just below the half
    expect(roundTo(625.005, 2)).toBe(625);
    expect(roundTo(6.255, 2)).toBe(6.25);
    expect(roundTo(1.0051, 2)).toBe(1.01);
  });

  it('sends exact halves to the even digit', () => {
    expect(roundTo(720.125, 2)).toBe(720.12);
    expect(roundTo(720.375, 2)).toBe(720.38);
    expect(roundTo(0.5, 0)).toBe(0);
    expect(roundTo(1.5, 0)).toBe(2);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(-2.5, 0)).toBe(-2);
    expect(roundTo(-3.5, 0)).toBe(-4);
  });

  it('carries into the whole part', () => {
    expect(roundTo(9.996, 2)).toBe(10);
    expect(roundTo(0.0996, 3)).toBe(0.1);
  });

  it('normalises negative zero', () => {
    expect(Object.is(roundTo(-0.0001, 3), 0)).toBe(true);
  });

  it('clamps into range', () => {
    expect(clamp(1.4, -1, 1)).toBe(1);
    expect(clamp(-3, -1, 1)).toBe(-1);
    expect(clamp(0.25, -1, 1)).toBe(0.25);
  });

  it('formats amounts with thousands separators', () => {
    expect(formatAmount(42000, 0)).toBe('42,000');
    expect(formatAmount(4.8, 2)).toBe('4.80');
    expect(formatAmount(1234.5, 2)).toBe('1,234.50');
  });

  it('formats with the same half-even rounding', () => {
    expect(formatAmount(0.5, 0)).toBe('0');
    expect(formatAmount(2_500.5, 0)).toBe('2,500');
    expect(formatAmount(3.5, 0)).toBe('4');
    expect(formatAmount(720.125, 2)).toBe('720.12');
  });
});
