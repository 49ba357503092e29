import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const CurrencyFilterSchema = z.object({
  currency: z.string().trim().optional(),
});

export const InitCommandOptionsSchema = JsonFlagSchema;

export const StatusCommandOptionsSchema = JsonFlagSchema;

export const RefreshViewsCommandOptionsSchema = JsonFlagSchema;

export const QualityShowCommandOptionsSchema = JsonFlagSchema.extend(CurrencyFilterSchema.shape);

export const QualityCalculateCommandOptionsSchema = JsonFlagSchema;

/**
 * Threshold stays a string here; range checking happens in the quality service.
 */
export const QualityLowCommandOptionsSchema = QualityShowCommandOptionsSchema.extend({
  threshold: z.string().trim().min(1, { message: '--threshold must not be empty' }).optional(),
});

export const DedupCommandOptionsSchema = JsonFlagSchema.extend({
  confirm: z.boolean().optional(),
});

export const CompositionCommandOptionsSchema = JsonFlagSchema.extend({
  byCurrency: z.boolean().optional(),
});
