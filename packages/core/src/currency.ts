import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ValidationError } from './errors/index.js';

/**
 * Currencies accepted by user-facing quality filters. The store's own currency
 * domain is read from the backend and may be wider.
 */
export const QUALITY_CURRENCIES = ['BCH', 'BTC', 'ETH', 'LTC', 'ZEC'] as const;

export type QualityCurrency = (typeof QUALITY_CURRENCIES)[number];

export const DEFAULT_QUALITY_THRESHOLD = 0.25;

const QualityCurrencySchema = z.enum(QUALITY_CURRENCIES);

const ThresholdSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().min(0).max(1));

/**
 * Parses an optional currency filter (case-insensitive). An empty or missing
 * filter means "all currencies" and yields `undefined`.
 */
export function parseCurrencyFilter(currency?: string): Result<QualityCurrency | undefined, ValidationError> {
  const code = (currency ?? '').toUpperCase();
  if (code === '') {
    return ok(undefined);
  }

  const parsed = QualityCurrencySchema.safeParse(code);
  if (!parsed.success) {
    return err(new ValidationError(`Currency not supported: ${code}`, { currency }));
  }
  return ok(parsed.data);
}

/**
 * Parses a quality threshold given as a number or numeric string in [0, 1].
 */
export function parseQualityThreshold(threshold: number | string): Result<number, ValidationError> {
  const parsed = ThresholdSchema.safeParse(threshold);
  if (!parsed.success) {
    return err(new ValidationError('Threshold must be a float number between 0 and 1', { threshold }));
  }
  return ok(parsed.data);
}
