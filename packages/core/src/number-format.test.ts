import { describe, expect, it } from 'vitest';

import {
  columnLabel,
  describeNumber,
  formatNumber,
  numberSuffix,
} from './number-format.js';

describe('formatNumber', () => {
  it('prints values below one thousand as integers', () => {
    expect(formatNumber(0)).toBe('0');
    expect(formatNumber(42.4)).toBe('42');
    expect(formatNumber(999)).toBe('999');
    expect(formatNumber(-17)).toBe('-17');
    expect(formatNumber(-0.4)).toBe('0');
  });

  it('uses the named suffixes for the first five groups', () => {
    expect(formatNumber(1000)).toBe('1.00K');
    expect(formatNumber(1234)).toBe('1.23K');
    expect(formatNumber(1e6)).toBe('1.00M');
    expect(formatNumber(1e9)).toBe('1.00B');
    expect(formatNumber(1e12)).toBe('1.00T');
    expect(formatNumber(1e15)).toBe('1.00Q');
  });

  it('continues with letter pairs past the named suffixes', () => {
    expect(formatNumber(1e18)).toBe('1.00aa');
    expect(formatNumber(1e21)).toBe('1.00ab');
  });

  it('carries a mantissa that rounds up to the next group', () => {
    expect(formatNumber(999_999)).toBe('1.00M');
  });

  it('keeps the sign of large negative values', () => {
    expect(formatNumber(-1500)).toBe('-1.50K');
  });

  it('renders non-finite values symbolically', () => {
    expect(formatNumber(Number.NaN)).toBe('NaN');
    expect(formatNumber(Number.POSITIVE_INFINITY)).toBe('+∞');
    expect(formatNumber(Number.NEGATIVE_INFINITY)).toBe('-∞');
  });
});

describe('numberSuffix', () => {
  it('maps engineering groups to suffixes', () => {
    expect(numberSuffix(0)).toBe('');
    expect(numberSuffix(1)).toBe('K');
    expect(numberSuffix(5)).toBe('Q');
    expect(numberSuffix(6)).toBe('aa');
    expect(numberSuffix(31)).toBe('az');
    expect(numberSuffix(32)).toBe('ba');
  });

  it('returns no suffix for negative or fractional groups', () => {
    expect(numberSuffix(-1)).toBe('');
    expect(numberSuffix(1.5)).toBe('');
  });
});

describe('columnLabel', () => {
  it('counts in bijective base 26', () => {
    expect(columnLabel(0)).toBe('a');
    expect(columnLabel(25)).toBe('z');
    expect(columnLabel(26)).toBe('aa');
    expect(columnLabel(27)).toBe('ab');
    expect(columnLabel(701)).toBe('zz');
    expect(columnLabel(702)).toBe('aaa');
    expect(columnLabel(-1)).toBe('');
  });
});

describe('describeNumber', () => {
  it('shows the raw value next to its display form', () => {
    expect(describeNumber(1500)).toBe('<Number value=1500 display=1.50K>');
  });
});
