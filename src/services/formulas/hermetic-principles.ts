import { diff, safeDivide } from './statistics';

export interface MentalismResult {
  principle: 'mentalism';
  intention: string;
  focus: string;
  marketAlignment: number;
  action: string;
}

export interface CorrespondenceResult {
  principle: 'correspondence';
  macroLevel: number;
  microLevel: number;
  correspondenceRatio: number;
  interpretation: string;
}

export interface VibrationResult {
  principle: 'vibration';
  frequency: number;
  wavelength: number;
  resonance: string;
  action: string;
}

export interface PolarityResult {
  principle: 'polarity';
  bullForce: number;
  bearForce: number;
  balancePoint: 50;
  marketState: 'bullish' | 'bearish';
}

export type RhythmResult =
  | { principle: 'rhythm'; insufficientData: true }
  | {
      principle: 'rhythm';
      upMovements: number;
      downMovements: number;
      cycleRatio: number;
      rhythm: string;
    };

export interface CauseEffectResult {
  principle: 'cause_and_effect';
  cause: string;
  effect: number;
  understanding: string;
  action: string;
}

export interface GenderResult {
  principle: 'gender';
  masculineActive: number;
  feminineReceptive: number;
  balance: string;
  marketState: 'active' | 'receptive';
}

// Two forces as percentages of their sum; an empty total is an even split.
function splitPercent(a: number, b: number): [number, number] {
  const total = a + b;
  if (total === 0) {
    return [50, 50];
  }
  return [(a / total) * 100, (b / total) * 100];
}

export function principleMentalism(intention: string, sentiment: number = 0): MentalismResult {
  return {
    principle: 'mentalism',
    intention,
    focus: 'Mental clarity and positive intention',
    marketAlignment: sentiment,
    action: 'Set clear intention before trading',
  };
}

export function principleCorrespondence(macro: number, micro: number): CorrespondenceResult {
  return {
    principle: 'correspondence',
    macroLevel: macro,
    microLevel: micro,
    correspondenceRatio: safeDivide(macro, micro),
    interpretation: 'Pattern repeats across scales',
  };
}

export function principleVibration(frequency: number): VibrationResult {
  return {
    principle: 'vibration',
    frequency,
    wavelength: safeDivide(1, frequency),
    resonance: 'Align with market frequency',
    action: 'Trade with market rhythm, not against it',
  };
}

export function principlePolarity(bull: number, bear: number): PolarityResult {
  const [bullPercent, bearPercent] = splitPercent(bull, bear);
  return {
    principle: 'polarity',
    bullForce: bullPercent,
    bearForce: bearPercent,
    balancePoint: 50,
    marketState: bullPercent > 50 ? 'bullish' : 'bearish',
  };
}

export function principleRhythm(prices: readonly number[]): RhythmResult {
  if (prices.length < 2) {
    return { principle: 'rhythm', insufficientData: true };
  }

  const changes = diff(prices);
  const ups = changes.filter(change => change > 0).length;
  const downs = changes.filter(change => change < 0).length;

  return {
    principle: 'rhythm',
    upMovements: ups,
    downMovements: downs,
    cycleRatio: ups / Math.max(1, downs),
    rhythm: 'Market oscillates between up and down',
  };
}

export function principleCauseEffect(cause: string, effect: number): CauseEffectResult {
  return {
    principle: 'cause_and_effect',
    cause,
    effect,
    understanding: 'Understand root causes of market movements',
    action: 'Research fundamentals before trading',
  };
}

export function principleGender(masculine: number, feminine: number): GenderResult {
  const [masculinePercent, femininePercent] = splitPercent(masculine, feminine);
  return {
    principle: 'gender',
    masculineActive: masculinePercent,
    feminineReceptive: femininePercent,
    balance: 'Optimal balance is 50/50',
    marketState: masculinePercent > 50 ? 'active' : 'receptive',
  };
}
