/**
 * Rolling simple moving average.
 * Entry i is the mean of prices[i .. i + period - 1], so the output has
 * prices.length - period + 1 points (empty when there is not enough data).
 * Each window is summed on its own, so a bad price only spoils the windows
 * that contain it.
 */
export const calculateSMASeries = (prices: number[], period: number): number[] => {
  if (period <= 0 || prices.length < period) return [];

  const result: number[] = [];
  for (let i = 0; i + period <= prices.length; i++) {
    let windowSum = 0;
    for (let j = i; j < i + period; j++) {
      windowSum += prices[j];
    }
    result.push(windowSum / period);
  }

  return result;
};

/**
 * Simple percentage returns between consecutive prices.
 * Non-finite results (zero or missing previous price) are dropped.
 */
export const calculateReturns = (prices: number[]): number[] => {
  const returns: number[] = [];

  for (let i = 1; i < prices.length; i++) {
    const change = prices[i] / prices[i - 1] - 1;
    if (Number.isFinite(change)) returns.push(change);
  }

  return returns;
};

// Sample (n - 1) standard deviation
export const calculateStdDev = (values: number[]): number => {
  if (values.length < 2) return 0;

  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1);

  return Math.sqrt(variance);
};

export const annualizeVolatility = (returns: number[], periodsPerYear: number = 252): number =>
  calculateStdDev(returns) * Math.sqrt(periodsPerYear);

export const last = (values: number[]): number | null =>
  values.length > 0 ? values[values.length - 1] : null;
