import { formatCurrency, formatPercent, percentageChange } from '../../src/utils/format';

describe('format', () => {
  it('formats currency with grouping and cents', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50');
    expect(formatCurrency(0)).toBe('$0.00');
  });

  it('renders missing values as zero dollars', () => {
    expect(formatCurrency(null)).toBe('$0.00');
    expect(formatCurrency(undefined)).toBe('$0.00');
    expect(formatCurrency(NaN)).toBe('$0.00');
  });

  it('formats fractions as percentages', () => {
    expect(formatPercent(0.1048)).toBe('10.48%');
  });

  it('computes percentage change', () => {
    expect(percentageChange(100, 110)).toBeCloseTo(10, 10);
    expect(percentageChange(0, 5)).toBe(Infinity);
    expect(percentageChange(0, -5)).toBe(0);
  });
});
