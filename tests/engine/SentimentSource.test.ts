import { NEUTRAL_SIGNED_READING, toSignedScore } from '../../src/engine/SentimentSource';
import { SentimentReading } from '../../src/types/market';

const reading = (score: number, scale: SentimentReading['scale']): SentimentReading => ({
  score,
  scale,
  summary: 'test',
  source: 'test',
  isFallback: false,
});

describe('toSignedScore', () => {
  it.each([
    [0.5, 0],
    [1, 1],
    [0, -1],
    [0.75, 0.5],
  ])('maps unit score %d to %d', (score, expected) => {
    expect(toSignedScore(reading(score, 'UNIT'))).toBeCloseTo(expected, 10);
  });

  it('passes signed scores through', () => {
    expect(toSignedScore(reading(-0.42, 'SIGNED'))).toBe(-0.42);
  });

  it('clamps out-of-range scores', () => {
    expect(toSignedScore(reading(1.7, 'SIGNED'))).toBe(1);
    expect(toSignedScore(reading(-3, 'SIGNED'))).toBe(-1);
    expect(toSignedScore(reading(1.5, 'UNIT'))).toBe(1);
  });

  it('treats non-finite scores as neutral', () => {
    expect(toSignedScore(reading(NaN, 'SIGNED'))).toBe(0);
    expect(toSignedScore(reading(Infinity, 'UNIT'))).toBe(0);
  });
});

describe('NEUTRAL_SIGNED_READING', () => {
  it('builds a zero fallback reading', () => {
    expect(NEUTRAL_SIGNED_READING('News', 'offline')).toEqual({
      score: 0,
      summary: 'offline',
      scale: 'SIGNED',
      source: 'News',
      isFallback: true,
    });
  });
});
