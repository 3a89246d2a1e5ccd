import type { RawScore } from '../oracle/types.js';

/**
 * Turns an oracle's raw score into a reward in [0, 1]. Must never throw:
 * anything it cannot read maps to 0.
 */
export type ScoreNormalizer = (raw: RawScore) => number;

export type ScoreScale = 'unit' | 'percent' | 'ten';

const NUMBER_PATTERN = /[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?/i;

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** First number found in the raw output, if any. */
export function extractNumber(raw: RawScore): number | undefined {
  if (typeof raw === 'number') return Number.isNaN(raw) ? undefined : raw;
  const match = raw.match(NUMBER_PATTERN);
  if (!match) return undefined;
  const value = Number(match[0]);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Linear map of [min, max] onto [0, 1], clamped at both ends.
 */
export function scaled(min: number, max: number): ScoreNormalizer {
  if (!(max > min)) {
    throw new RangeError(`Invalid score scale [${min}, ${max}]`);
  }
  return (raw) => {
    const value = extractNumber(raw);
    if (value === undefined) return 0;
    return clampUnit((value - min) / (max - min));
  };
}

export const unitInterval: ScoreNormalizer = scaled(0, 1);

export function normalizerForScale(scale: ScoreScale): ScoreNormalizer {
  switch (scale) {
    case 'unit':
      return unitInterval;
    case 'percent':
      return scaled(0, 100);
    case 'ten':
      return scaled(0, 10);
  }
}
