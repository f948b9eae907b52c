import { entanglement, observerEffect, superposition } from '../quantum-consciousness';

describe('superposition', () => {
  it('should weigh each option by the total', () => {
    expect(superposition(3, 1)).toMatchObject({ probabilityA: 0.75, probabilityB: 0.25 });
  });

  it('should return 0.5 each when the total is not positive', () => {
    expect(superposition(0, 0)).toMatchObject({ probabilityA: 0.5, probabilityB: 0.5 });
    expect(superposition(-2, 1)).toMatchObject({ probabilityA: 0.5, probabilityB: 0.5 });
  });
});

describe('entanglement', () => {
  it('should be fully correlated for equal prices', () => {
    expect(entanglement(50, 50).correlation).toBe(1);
  });

  it('should shrink with the relative gap', () => {
    expect(entanglement(75, 100).correlation).toBe(0.75);
  });

  it('should return 0 when both prices are 0', () => {
    expect(entanglement(0, 0).correlation).toBe(0);
  });
});

describe('observerEffect', () => {
  it('should keep the market state it was given', () => {
    const marketState = { trend: 'up', volume: 10 };
    expect(observerEffect('breakout', marketState)).toMatchObject({
      principle: 'observer_effect',
      observation: 'breakout',
      marketStateBefore: marketState,
    });
  });
});
