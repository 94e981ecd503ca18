import {
  describe,
  expect,
  it
} from 'vitest';

import { Configuration } from '../../src/Configuration.ts';
import { HillClimbingStrategy } from '../../src/strategies/HillClimbingStrategy.ts';
import {
  SAMPLE_SOLUTION,
  SWAPPED_IN_FIRST_BOX,
  SWAPPED_IN_LAST_BOX,
  zeroRandom
} from '../puzzleTestHelper.ts';

describe('HillClimbingStrategy', () => {
  const strategy = new HillClimbingStrategy();

  it('stops at once on a solved configuration', () => {
    const result = strategy.run(Configuration.fromPuzzle(SAMPLE_SOLUTION), zeroRandom);
    expect(result).toMatchObject({ conflicts: 0, iterations: 0, stopReason: 'solved' });
  });

  it('accepts a strictly better neighbor', () => {
    const result = strategy.run(SWAPPED_IN_FIRST_BOX, zeroRandom);
    expect(result).toMatchObject({ conflicts: 0, iterations: 1, stopReason: 'solved' });
    expect(result.configuration.toString()).toBe(SAMPLE_SOLUTION);
  });

  it('stops at a local optimum without moving', () => {
    const result = strategy.run(SWAPPED_IN_LAST_BOX, zeroRandom);
    expect(result).toMatchObject({ conflicts: 4, iterations: 1, stopReason: 'local-optimum' });
    expect(result.configuration).toBe(SWAPPED_IN_LAST_BOX);
  });

  it('rejects a fractional or negative iteration cap', () => {
    expect(() => new HillClimbingStrategy({ maxIterations: 1.5 }))
      .toThrow('maxIterations must be a non-negative integer');
    expect(() => new HillClimbingStrategy({ maxIterations: -1 }))
      .toThrow('maxIterations must be a non-negative integer');
  });

  it('respects the iteration cap', () => {
    const capped = new HillClimbingStrategy({ maxIterations: 0 });
    const result = capped.run(SWAPPED_IN_FIRST_BOX, zeroRandom);
    expect(result).toMatchObject({ conflicts: 4, iterations: 0, stopReason: 'budget' });
  });

  it('is named for reports', () => {
    expect(strategy.name).toBe('hill-climbing');
  });
});
