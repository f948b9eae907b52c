import {
  FIBONACCI,
  flowerOfLifePattern,
  goldenRatioLevels,
  PHI,
  vesicaPiscisRatio,
} from '../sacred-geometry';

describe('goldenRatioLevels', () => {
  it('should return one strictly positive level per Fibonacci entry', () => {
    const levels = goldenRatioLevels(100);
    expect(levels).toHaveLength(FIBONACCI.length);
    expect(levels).toHaveLength(16);
    expect(levels.every(level => level > 0)).toBe(true);
  });

  it('should scale the price by PHI to the power fib / 10', () => {
    const levels = goldenRatioLevels(100);
    expect(levels[0]).toBeCloseTo(100 * PHI ** 0.1, 10);
    expect(levels[3]).toBeCloseTo(100 * PHI ** 0.3, 10);
    expect(levels[15]).toBeCloseTo(100 * PHI ** 98.7, 0);
  });

  it('should return identical output for identical input', () => {
    expect(goldenRatioLevels(42.5)).toEqual(goldenRatioLevels(42.5));
  });
});

describe('flowerOfLifePattern', () => {
  it('should flag fewer than six points as insufficient', () => {
    expect(flowerOfLifePattern([])).toEqual({ pattern: 'insufficient_data' });
    expect(flowerOfLifePattern([1, 2, 3, 4, 5])).toEqual({ pattern: 'insufficient_data' });
  });

  /**
   * 19 equal values leave no full window before the last one, so the score
   * is 0 and no division by a zero spread happens.
   */
  it('should score nineteen equal values as 0', () => {
    const result = flowerOfLifePattern(Array<number>(19).fill(10));
    expect(result).toEqual({
      pattern: 'flower_of_life',
      harmonyScore: 0,
      interpretation: 'Sacred pattern alignment',
    });
  });

  it('should skip flat windows through the std guard', () => {
    const result = flowerOfLifePattern(Array<number>(38).fill(7));
    expect(result).toMatchObject({ pattern: 'flower_of_life', harmonyScore: 0 });
  });

  it('should score a short series as 0', () => {
    expect(flowerOfLifePattern([1, 2, 3, 4, 5, 6])).toMatchObject({ harmonyScore: 0 });
  });

  /**
   * One window of nine 9s and ten 11s: mean 10.0526..., std 0.9986...,
   * harmony 1 - std / mean, averaged over (20 - 19) / 19 clamped to 1.
   */
  it('should score a window with spread', () => {
    const data = [...Array<number>(9).fill(9), ...Array<number>(10).fill(11), 50];
    const segment = data.slice(0, 19);
    const mean = segment.reduce((sum, value) => sum + value, 0) / 19;
    const std = Math.sqrt(segment.reduce((sum, value) => sum + (value - mean) ** 2, 0) / 19);

    const result = flowerOfLifePattern(data);

    expect(result).toMatchObject({ pattern: 'flower_of_life' });
    if (result.pattern === 'flower_of_life') {
      expect(result.harmonyScore).toBeCloseTo(1 - std / mean, 12);
      expect(result.harmonyScore).toBeCloseTo(0.9007, 3);
    }
  });

  // std / mean > 1 here, so the window's harmony is negative and clamped to 0
  it('should not let a negative harmony lower the score', () => {
    const data = [...Array<number>(18).fill(0), 19, 5];
    expect(flowerOfLifePattern(data)).toMatchObject({ harmonyScore: 0 });
  });
});

describe('vesicaPiscisRatio', () => {
  it('should return 0 when either value is 0', () => {
    expect(vesicaPiscisRatio(0, 5)).toBe(0);
    expect(vesicaPiscisRatio(5, 0)).toBe(0);
  });

  it('should measure the distance from sqrt(3) / 2', () => {
    expect(vesicaPiscisRatio(1, 1)).toBeCloseTo(1 - Math.sqrt(3) / 2, 12);
    expect(vesicaPiscisRatio(Math.sqrt(3), 2)).toBeCloseTo(0, 12);
  });
});
