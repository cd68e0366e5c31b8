import { describe, it, expect } from 'vitest';
import { confidenceOf, confidenceTier } from '../../src/prediction/confidence.js';

describe('confidenceOf', () => {
  it('should return the larger side probability', () => {
    expect(confidenceOf(0.8)).toBe(0.8);
    expect(confidenceOf(0.25)).toBe(0.75);
    expect(confidenceOf(0.5)).toBe(0.5);
  });

  it('should stay within [0.5, 1]', () => {
    expect(confidenceOf(1)).toBe(1);
    expect(confidenceOf(0)).toBe(1);
    expect(confidenceOf(Number.NaN)).toBe(0.5);
  });
});

describe('confidenceTier', () => {
  it('should use 0.70 and 0.60 as the tier boundaries', () => {
    expect(confidenceTier(0.95)).toBe('high');
    expect(confidenceTier(0.7)).toBe('high');
    expect(confidenceTier(0.69)).toBe('medium');
    expect(confidenceTier(0.6)).toBe('medium');
    expect(confidenceTier(0.59)).toBe('low');
    expect(confidenceTier(0.5)).toBe('low');
  });

  it('should be total', () => {
    expect(confidenceTier(Number.NaN)).toBe('low');
  });
});
