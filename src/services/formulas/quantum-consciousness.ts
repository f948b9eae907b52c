export interface ObserverEffectResult {
  principle: 'observer_effect';
  observation: string;
  marketStateBefore: Record<string, unknown>;
  consciousnessImpact: string;
  action: string;
}

export interface SuperpositionResult {
  principle: 'superposition';
  optionA: number;
  optionB: number;
  probabilityA: number;
  probabilityB: number;
  interpretation: string;
}

export interface EntanglementResult {
  principle: 'entanglement';
  asset1: number;
  asset2: number;
  correlation: number;
  interpretation: string;
}

export function observerEffect(
  observation: string,
  marketState: Record<string, unknown>
): ObserverEffectResult {
  return {
    principle: 'observer_effect',
    observation,
    marketStateBefore: marketState,
    consciousnessImpact: 'Positive intention creates positive outcomes',
    action: 'Maintain positive, focused consciousness',
  };
}

export function superposition(optionA: number, optionB: number): SuperpositionResult {
  const total = optionA + optionB;
  return {
    principle: 'superposition',
    optionA,
    optionB,
    probabilityA: total > 0 ? optionA / total : 0.5,
    probabilityB: total > 0 ? optionB / total : 0.5,
    interpretation: 'Market exists in multiple states until observation',
  };
}

export function entanglement(asset1Price: number, asset2Price: number): EntanglementResult {
  const scale = Math.max(asset1Price, asset2Price);
  return {
    principle: 'entanglement',
    asset1: asset1Price,
    asset2: asset2Price,
    correlation: scale === 0 ? 0 : 1 - Math.abs(asset1Price - asset2Price) / scale,
    interpretation: 'Assets are entangled - movements affect each other',
  };
}
