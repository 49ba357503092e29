import { describe, expect, it } from 'vitest';

import { CompositionCommandOptionsSchema, QualityLowCommandOptionsSchema } from '../schemas.js';

describe('QualityLowCommandOptionsSchema', () => {
  it('trims currency and threshold', () => {
    const parsed = QualityLowCommandOptionsSchema.parse({ currency: ' eth ', threshold: ' 0.5 ' });

    expect(parsed).toEqual({ currency: 'eth', threshold: '0.5' });
  });

  it('rejects an empty threshold', () => {
    const parsed = QualityLowCommandOptionsSchema.safeParse({ threshold: '  ' });

    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0]?.message).toBe('--threshold must not be empty');
  });
});

describe('CompositionCommandOptionsSchema', () => {
  it('accepts the by-currency flag', () => {
    expect(CompositionCommandOptionsSchema.parse({ byCurrency: true, json: true })).toEqual({
      byCurrency: true,
      json: true,
    });
  });
});
