import { describe, expect, it } from 'vitest';
import { calculateCost, getModelPricing } from '../../../src/models/pricing.js';

describe('getModelPricing', () => {
  it('resolves dated releases to their family', () => {
    expect(getModelPricing('claude-sonnet-4-20250514')).toEqual({ inputPer1M: 3, outputPer1M: 15 });
    expect(getModelPricing('claude-3-5-haiku-20241022')).toEqual({ inputPer1M: 0.8, outputPer1M: 4 });
  });

  it('accepts CLI aliases', () => {
    expect(getModelPricing('opus')).toEqual({ inputPer1M: 15, outputPer1M: 75 });
  });

  it('returns null for unknown models', () => {
    expect(getModelPricing('some-local-model')).toBeNull();
  });
});

describe('calculateCost', () => {
  it('prices input and output tokens per million', () => {
    expect(calculateCost('claude-opus-4-20250514', 1_000_000, 1_000_000)).toBe(90);
    expect(calculateCost('claude-sonnet-4-20250514', 2000, 1000)).toBeCloseTo(0.021, 10);
  });

  it('returns 0 for unknown models', () => {
    expect(calculateCost('mystery', 1000, 1000)).toBe(0);
  });
});
