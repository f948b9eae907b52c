import { mean, populationStd } from './statistics';

export const PHI = (1 + Math.sqrt(5)) / 2;

export const FIBONACCI: readonly number[] = [
  1, 1, 2, 3, 5, 8, 13, 21, 34, 55, 89, 144, 233, 377, 610, 987,
];

export const PLATONIC_SOLIDS = {
  tetrahedron: 4,
  cube: 6,
  octahedron: 8,
  icosahedron: 20,
  dodecahedron: 12,
} as const;

export const FLOWER_CIRCLES = 19;
export const FLOWER_MIN_POINTS = 6;

const VESICA_RATIO = Math.sqrt(3) / 2;

export type FlowerOfLifeResult =
  | { pattern: 'insufficient_data' }
  | { pattern: 'flower_of_life'; harmonyScore: number; interpretation: string };

/**
 * Support/resistance levels: `price * PHI^(fib / 10)` for every entry of
 * the Fibonacci table.
 */
export function goldenRatioLevels(price: number): number[] {
  return FIBONACCI.map(fib => price * PHI ** (fib / 10));
}

/**
 * Scores the series in windows of 19 points. Each window with a non-zero
 * spread adds `max(0, 1 - std / mean)`; flat windows add nothing.
 */
export function flowerOfLifePattern(data: readonly number[]): FlowerOfLifeResult {
  if (data.length < FLOWER_MIN_POINTS) {
    return { pattern: 'insufficient_data' };
  }

  let patternScore = 0;
  for (let i = 0; i < data.length - FLOWER_CIRCLES; i += FLOWER_CIRCLES) {
    const segment = data.slice(i, i + FLOWER_CIRCLES);
    const std = populationStd(segment);
    if (std > 0) {
      const harmony = 1 - std / mean(segment);
      patternScore += Math.max(0, harmony);
    }
  }

  return {
    pattern: 'flower_of_life',
    harmonyScore: patternScore / Math.max(1, (data.length - FLOWER_CIRCLES) / FLOWER_CIRCLES),
    interpretation: 'Sacred pattern alignment',
  };
}

export function vesicaPiscisRatio(value1: number, value2: number): number {
  if (value1 === 0 || value2 === 0) {
    return 0;
  }
  return Math.abs(value1 / value2 - VESICA_RATIO);
}
