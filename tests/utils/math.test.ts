import { describe, it, expect } from 'vitest';
import { clamp, round, variance } from '../../src/utils/math.js';

describe('math helpers', () => {
  it('round should keep the requested decimals', () => {
    expect(round(0.56789, 3)).toBe(0.568);
    expect(round(12.345, 0)).toBe(12);
  });

  it('clamp should bound both ends', () => {
    expect(clamp(1.4, 0, 1)).toBe(1);
    expect(clamp(-0.2, 0, 1)).toBe(0);
    expect(clamp(0.3, 0, 1)).toBe(0.3);
  });

  it('variance should divide by n', () => {
    expect(variance([0.2, 0.8, 0.4, 0.6])).toBeCloseTo(0.05, 10);
    expect(variance([])).toBe(0);
    expect(variance([3])).toBe(0);
  });
});
