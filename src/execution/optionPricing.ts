import { OptionRight } from '../core/types';
import { round } from '../core/utils';

export const CONTRACT_MULTIPLIER = 100;

// Flat implied volatility for paper pricing; there is no option chain behind the stub.
const PAPER_IMPLIED_VOL = 0.25;

/**
 * Rough per-share premium: intrinsic value plus a time value of
 * 0.4 * sigma * sqrt(T) * spot, which tracks an at-the-money price.
 */
export const estimatePremium = (spot: number, strike: number, right: OptionRight, daysToExpiry: number): number => {
  const intrinsic = right === 'call' ? Math.max(0, spot - strike) : Math.max(0, strike - spot);
  const years = Math.max(daysToExpiry, 1) / 365;
  const moneyness = Math.abs(spot - strike) / spot;
  const timeValue = 0.4 * PAPER_IMPLIED_VOL * Math.sqrt(years) * spot * Math.exp(-moneyness * 10);
  return round(intrinsic + timeValue, 2);
};

export const daysBetween = (fromISO: string, toISO: string): number => {
  const from = new Date(`${fromISO.slice(0, 10)}T00:00:00Z`).getTime();
  const to = new Date(`${toISO.slice(0, 10)}T00:00:00Z`).getTime();
  return Math.round((to - from) / 86_400_000);
};
