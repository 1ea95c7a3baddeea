// Market Figure Validator
// Normalizes LLM-reported market values and growth rates, then holds them to
// plausibility bounds. Every change is recorded as a NumericAdjustment so the
// phase can be flagged low-confidence instead of silently corrected.

import type { NumericAdjustment } from '../types';

export interface PlausibilityBounds {
  minGrowthRatePercent: number;
  maxGrowthRatePercent: number;
  minMarketSizeUsdMillions: number;
  maxMarketSizeUsdMillions: number;
  /** Per-industry market size ranges (USD millions), keyed lowercase */
  industryMarketRanges?: Record<string, { min: number; max: number }>;
}

// ── Parsing ─────────────────────────────────────────────────────────

const UNIT_MULTIPLIERS: Array<[RegExp, number]> = [
  [/^(trillion|tn|t)$/i, 1_000_000],
  [/^(billion|bn|b)$/i, 1_000],
  [/^(million|mn|mm|m)$/i, 1],
  [/^(thousand|k)$/i, 0.001],
];

/**
 * Market value in USD millions. Bare numbers are taken as millions;
 * strings may carry a currency symbol and a unit ("$12.5 billion", "3.2B").
 */
export function parseMarketValue(value: number | string): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  const match = value.replace(/,/g, '').match(/(-?\d+(?:\.\d+)?)\s*([a-z]+)?/i);
  if (!match) return null;

  const amount = Number(match[1]);
  if (!Number.isFinite(amount)) return null;

  const unit = match[2];
  if (!unit) return amount;
  for (const [pattern, multiplier] of UNIT_MULTIPLIERS) {
    if (pattern.test(unit)) return amount * multiplier;
  }
  return amount;
}

/** Percentage as a number ("12.5%" → 12.5). */
export function parsePercent(value: number | string): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const match = value.replace(/,/g, '').match(/-?\d+(?:\.\d+)?/);
  if (!match) return null;
  const n = Number(match[0]);
  return Number.isFinite(n) ? n : null;
}

// ── Bounds ──────────────────────────────────────────────────────────

export interface BoundedValue {
  value: number;
  adjustment?: NumericAdjustment;
}

function clamp(field: string, value: number, min: number, max: number, label: string): BoundedValue {
  if (value > max) {
    return { value: max, adjustment: { field, original: value, adjusted: max, reason: `${label} above plausible maximum ${max}` } };
  }
  if (value < min) {
    return { value: min, adjustment: { field, original: value, adjusted: min, reason: `${label} below plausible minimum ${min}` } };
  }
  return { value };
}

export function boundGrowthRate(value: number, bounds: PlausibilityBounds, field = 'growthRatePercent'): BoundedValue {
  return clamp(field, value, bounds.minGrowthRatePercent, bounds.maxGrowthRatePercent, 'Growth rate');
}

export function boundMarketSize(
  value: number,
  bounds: PlausibilityBounds,
  industry = '',
  field = 'marketSizeUsdMillions',
): BoundedValue {
  const range = bounds.industryMarketRanges?.[industry.trim().toLowerCase()];
  const min = range?.min ?? bounds.minMarketSizeUsdMillions;
  const max = range?.max ?? bounds.maxMarketSizeUsdMillions;
  return clamp(field, value, min, max, 'Market size');
}

export function boundPercentage(value: number, field: string): BoundedValue {
  return clamp(field, value, 0, 100, 'Share');
}
