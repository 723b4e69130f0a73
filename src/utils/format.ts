const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Formats a value as USD, e.g. 1234.5 -> "$1,234.50".
 * Missing or non-finite values render as "$0.00".
 */
export const formatCurrency = (value: number | null | undefined): string => {
  if (value === null || value === undefined || !Number.isFinite(value)) return '$0.00';
  return currencyFormatter.format(value);
};

export const formatPercent = (fraction: number, digits: number = 2): string =>
  `${(fraction * 100).toFixed(digits)}%`;

export const percentageChange = (initial: number, final: number): number => {
  if (initial === 0) return final > 0 ? Infinity : 0;
  return ((final - initial) / initial) * 100;
};
