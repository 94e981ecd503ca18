import type { Configuration } from '../Configuration.ts';
import type { RandomSource } from '../random.ts';
import type {
  LocalSearchResult,
  LocalSearchStrategy
} from './LocalSearchStrategy.ts';

import { countConflicts } from '../conflicts.ts';
import { findBestNeighbor } from '../neighbors.ts';
import { assertIterationBudget } from './LocalSearchStrategy.ts';

export interface HillClimbingOptions {
  readonly maxIterations: number;
}

const DEFAULT_MAX_ITERATIONS = 150;

export const DEFAULT_HILL_CLIMBING_OPTIONS: HillClimbingOptions = {
  maxIterations: DEFAULT_MAX_ITERATIONS
};

export class HillClimbingStrategy implements LocalSearchStrategy {
  public readonly name = 'hill-climbing';

  private readonly options: HillClimbingOptions;

  public constructor(options: HillClimbingOptions = DEFAULT_HILL_CLIMBING_OPTIONS) {
    this.options = validateHillClimbingOptions(options);
  }

  public run(start: Configuration, random: RandomSource): LocalSearchResult {
    let current = start;
    let currentConflicts = countConflicts(current);

    for (let iteration = 0; iteration < this.options.maxIterations; iteration++) {
      if (currentConflicts === 0) {
        return { configuration: current, conflicts: 0, iterations: iteration, stopReason: 'solved' };
      }
      const best = findBestNeighbor(current, random);
      if (best.conflicts >= currentConflicts) {
        return {
          configuration: current,
          conflicts: currentConflicts,
          iterations: iteration + 1,
          stopReason: 'local-optimum'
        };
      }
      current = best.configuration;
      currentConflicts = best.conflicts;
    }

    return {
      configuration: current,
      conflicts: currentConflicts,
      iterations: this.options.maxIterations,
      stopReason: currentConflicts === 0 ? 'solved' : 'budget'
    };
  }
}

/**
 * Returns `options` unchanged, or throws an `Error` naming the first invalid field prefixed with `fieldPrefix`.
 */
export function validateHillClimbingOptions(options: HillClimbingOptions, fieldPrefix = ''): HillClimbingOptions {
  assertIterationBudget(options.maxIterations, `${fieldPrefix}maxIterations`);
  return options;
}
