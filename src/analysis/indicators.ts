import { round, sum } from '../core/utils';

export const sma = (values: number[], window: number): number | undefined => {
  if (window <= 0 || values.length < window) return undefined;
  return sum(values.slice(-window)) / window;
};

export const dailyReturns = (closes: number[]): number[] => {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    if (closes[i - 1] > 0) out.push(closes[i] / closes[i - 1] - 1);
  }
  return out;
};

export const annualizedVolatility = (closes: number[]): number | undefined => {
  const rets = dailyReturns(closes);
  if (rets.length < 2) return undefined;
  const mean = sum(rets) / rets.length;
  const variance = sum(rets.map((r) => (r - mean) ** 2)) / (rets.length - 1);
  return Math.sqrt(variance) * Math.sqrt(252);
};

// Wilder-style RSI over the last `period` changes.
export const rsi = (closes: number[], period = 14): number | undefined => {
  if (closes.length <= period) return undefined;
  const recent = closes.slice(-(period + 1));
  let gains = 0;
  let losses = 0;
  for (let i = 1; i < recent.length; i++) {
    const change = recent[i] - recent[i - 1];
    if (change > 0) gains += change;
    else losses -= change;
  }
  if (losses === 0) return 100;
  const rs = gains / period / (losses / period);
  return 100 - 100 / (1 + rs);
};

// Merges levels within `tolerance` of their neighbour into their mean.
export const clusterLevels = (levels: number[], tolerance = 0.02): number[] => {
  if (!levels.length) return [];
  const sorted = levels.slice().sort((a, b) => a - b);
  const clustered: number[] = [];
  let current = [sorted[0]];
  for (const level of sorted.slice(1)) {
    const last = current[current.length - 1];
    if (Math.abs(level - last) / last < tolerance) {
      current.push(level);
    } else {
      clustered.push(sum(current) / current.length);
      current = [level];
    }
  }
  clustered.push(sum(current) / current.length);
  return clustered;
};

/**
 * Local extremes over a centred window, clustered, keeping the top five of
 * each side. Needs at least two full windows of history.
 */
export const supportResistance = (closes: number[], window = 20): { support: number[]; resistance: number[] } => {
  if (closes.length < window * 2) return { support: [], resistance: [] };
  const highs: number[] = [];
  const lows: number[] = [];
  for (let i = window; i < closes.length - window; i++) {
    const slice = closes.slice(i - window, i + window + 1);
    if (closes[i] === Math.max(...slice)) highs.push(closes[i]);
    if (closes[i] === Math.min(...slice)) lows.push(closes[i]);
  }
  return {
    support: clusterLevels(lows).slice(-5).map((v) => round(v, 2)),
    resistance: clusterLevels(highs).slice(-5).map((v) => round(v, 2))
  };
};

export const detectPatterns = (closes: number[]): string[] => {
  const patterns: string[] = [];
  if (closes.length >= 51) {
    const prev = closes.slice(0, -1);
    const fastNow = sma(closes, 20);
    const slowNow = sma(closes, 50);
    const fastPrev = sma(prev, 20);
    const slowPrev = sma(prev, 50);
    if (fastNow !== undefined && slowNow !== undefined && fastPrev !== undefined && slowPrev !== undefined) {
      if (fastPrev < slowPrev && fastNow > slowNow) patterns.push('Golden Cross (SMA 20/50)');
      if (fastPrev > slowPrev && fastNow < slowNow) patterns.push('Death Cross (SMA 20/50)');
    }
  }
  const rsiNow = rsi(closes);
  if (rsiNow !== undefined) {
    if (rsiNow > 70) patterns.push('RSI Overbought (>70)');
    else if (rsiNow < 30) patterns.push('RSI Oversold (<30)');
  }
  if (closes.length >= 20) {
    const base = closes[closes.length - 20];
    const change = ((closes[closes.length - 1] - base) / base) * 100;
    if (change > 10) patterns.push(`Strong Uptrend (+${change.toFixed(1)}% in 20 days)`);
    else if (change < -10) patterns.push(`Strong Downtrend (${change.toFixed(1)}% in 20 days)`);
  }
  return patterns;
};
