import { describe, it, expect } from 'vitest';
import { calculateCost, estimateCost } from './cost.js';

describe('calculateCost', () => {
  it('prices prompt and completion tokens separately', () => {
    const cost = calculateCost(
      { promptTokens: 2_000_000, completionTokens: 1_000_000 },
      { inputPer1M: 2.5, outputPer1M: 10 }
    );

    expect(cost).toBe(15);
  });

  it('is zero for an unpriced backend', () => {
    expect(calculateCost({ promptTokens: 500, completionTokens: 500 }, undefined)).toBe(0);
  });

  it('is zero for zero usage', () => {
    const usage = { promptTokens: 0, completionTokens: 0 };

    expect(calculateCost(usage, { inputPer1M: 3, outputPer1M: 12 })).toBe(0);
  });
});

describe('estimateCost', () => {
  it('counts input tokens only', () => {
    expect(estimateCost(4_000_000, { inputPer1M: 0.5, outputPer1M: 1.5 })).toBe(2);
  });

  it('is zero without pricing', () => {
    expect(estimateCost(1000, undefined)).toBe(0);
  });
});
