import { AnalysisResult, isAnalysisFailure, SIGNAL_LABELS } from '../types/trading';
import { REGIME_LABELS } from '../types/analysis';
import { TIME_FRAME_LABELS } from '../types/market';
import { PriceSeries } from '../types/market';
import { formatCurrency, percentageChange } from '../utils/format';

// Change from the first to the last close of the analysed series
export const formatPeriodChange = (series: PriceSeries): string => {
  if (series.length === 0) return 'n/a';

  const change = percentageChange(series[0].close, series[series.length - 1].close);
  if (!Number.isFinite(change)) return 'n/a';

  return `${change >= 0 ? '+' : ''}${change.toFixed(2)}%`;
};

/**
 * Plain-text rendering of an analysis result for terminals and logs
 */
export const formatReport = (result: AnalysisResult): string => {
  if (isAnalysisFailure(result)) {
    return `Analysis failed: ${result.error}`;
  }

  const { signal, riskParameters: risk, sentiment } = result;

  const lines = [
    `Analysis for ${result.symbol} (${TIME_FRAME_LABELS[result.timeFrame]})`,
    `Recommendation: ${SIGNAL_LABELS[signal.action]}`,
    `Trade Rationale: ${signal.rationale}`,
    '',
    `Latest Price: ${formatCurrency(result.latestPrice)}`,
    `Period Change: ${formatPeriodChange(result.priceSeries)}`,
    `Market Personality: ${REGIME_LABELS[result.regime]}`,
    `Sentiment Score: ${signal.sentimentScore.toFixed(2)}${sentiment.isFallback ? ' (fallback)' : ''}`,
    '',
  ];

  if (signal.actionable && risk.positionSize > 0) {
    lines.push(
      `Portfolio Value: ${formatCurrency(risk.portfolioValue)}`,
      `Suggested Position Size: ${risk.positionSize} shares`,
      `Suggested Stop-Loss Price: ${formatCurrency(risk.stopLossPrice)}`,
      `Suggested Target Price: ${formatCurrency(risk.targetPrice)}`,
      `Risk/Reward Ratio: ${risk.riskRewardLabel}`,
    );
  } else {
    lines.push('No trade is recommended, so no risk parameters have been calculated.');
  }

  lines.push('', `Sentiment (${sentiment.source}): ${sentiment.summary}`);

  return lines.join('\n');
};
