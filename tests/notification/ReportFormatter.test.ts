import { formatPeriodChange, formatReport } from '../../src/notification/ReportFormatter';
import { RecommendationSynthesizer } from '../../src/analysis/RecommendationSynthesizer';
import { RegimeClassifier } from '../../src/analysis/RegimeClassifier';
import { AnalysisReport, RiskParameters } from '../../src/types/trading';
import { barsFromCloses, linearCloses } from '../helpers/series';

const synthesizer = new RecommendationSynthesizer();
const series = barsFromCloses(linearCloses(41, 1, 60));

const report = (sentimentScore: number, riskParameters: RiskParameters): AnalysisReport => {
  const regimeAnalysis = new RegimeClassifier().analyze(series);
  return {
    symbol: 'AAPL',
    timeFrame: 'DAILY',
    latestPrice: 100,
    priceSeries: series,
    sentiment: { score: sentimentScore, summary: 'Mostly upbeat coverage.', scale: 'SIGNED', source: 'Stub', isFallback: false },
    regime: regimeAnalysis.regime,
    regimeAnalysis,
    riskParameters,
    signal: synthesizer.synthesize(sentimentScore, regimeAnalysis.regime),
    generatedAt: 0,
  };
};

describe('formatReport', () => {
  it('renders failures on one line', () => {
    expect(formatReport({ error: 'No data.' })).toBe('Analysis failed: No data.');
  });

  it('renders an actionable recommendation with its trade plan', () => {
    const text = formatReport(report(0.6, {
      entryPrice: 100,
      stopLossPrice: 95,
      targetPrice: 110,
      positionSize: 400,
      riskRewardRatio: 2,
      riskRewardLabel: '1:2',
      riskAmount: 2000,
      portfolioValue: 100000,
    }));

    expect(text.split('\n')).toEqual([
      'Analysis for AAPL (Daily)',
      'Recommendation: STRONG BUY',
      "Trade Rationale: The stock is in a strong 'Trending Up' pattern with very positive market sentiment (score: 0.60). This indicates a high-confidence buying opportunity.",
      '',
      'Latest Price: $100.00',
      'Period Change: +143.90%',
      'Market Personality: Trending Up',
      'Sentiment Score: 0.60',
      '',
      'Portfolio Value: $100,000.00',
      'Suggested Position Size: 400 shares',
      'Suggested Stop-Loss Price: $95.00',
      'Suggested Target Price: $110.00',
      'Risk/Reward Ratio: 1:2',
      '',
      'Sentiment (Stub): Mostly upbeat coverage.',
    ]);
  });

  it('omits the trade plan for a hold', () => {
    const text = formatReport(report(-0.4, {
      entryPrice: 100,
      stopLossPrice: 0,
      targetPrice: 0,
      positionSize: 0,
      riskRewardRatio: 2,
      riskRewardLabel: '1:2',
      riskAmount: 0,
      portfolioValue: 100000,
    }));
    const lines = text.split('\n');

    expect(lines[1]).toBe('Recommendation: HOLD');
    expect(lines[9]).toBe('No trade is recommended, so no risk parameters have been calculated.');
    expect(lines).not.toContain('Risk/Reward Ratio: 1:2');
  });

  describe('formatPeriodChange', () => {
    it('signs the change over the series', () => {
      expect(formatPeriodChange(barsFromCloses([80, 90, 100]))).toBe('+25.00%');
      expect(formatPeriodChange(barsFromCloses([100, 90, 75]))).toBe('-25.00%');
    });

    it('has no change for an empty series or a zero first close', () => {
      expect(formatPeriodChange([])).toBe('n/a');
      expect(formatPeriodChange(barsFromCloses([0, 10]))).toBe('n/a');
    });
  });
});
