import type { RandomSource } from './random.ts';
import type { LocalSearchOptions } from './strategies/createLocalSearchStrategy.ts';
import type { LocalSearchResult } from './strategies/LocalSearchStrategy.ts';

import { Configuration } from './Configuration.ts';
import { createLocalSearchStrategy } from './strategies/createLocalSearchStrategy.ts';

export interface SolveApproxOptions extends LocalSearchOptions {
  readonly random?: RandomSource;
}

/**
 * Fills every box with a random permutation around its clues, then minimizes row and column conflicts.
 * Always returns a configuration; it is a solution only when `conflicts` is 0. Out-of-range options throw before
 * any search starts.
 */
export function solveApprox(puzzle: string, options: SolveApproxOptions = {}): LocalSearchResult {
  const strategy = createLocalSearchStrategy(options);
  const random = options.random ?? Math.random;
  const start = Configuration.fromPuzzle(puzzle).fillBoxes(random);
  return strategy.run(start, random);
}
