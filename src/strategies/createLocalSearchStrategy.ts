import type { HillClimbingOptions } from './HillClimbingStrategy.ts';
import type { LocalSearchStrategy } from './LocalSearchStrategy.ts';
import type { SimulatedAnnealingOptions } from './SimulatedAnnealingStrategy.ts';

import {
  DEFAULT_HILL_CLIMBING_OPTIONS,
  HillClimbingStrategy
} from './HillClimbingStrategy.ts';
import {
  DEFAULT_SIMULATED_ANNEALING_OPTIONS,
  SimulatedAnnealingStrategy
} from './SimulatedAnnealingStrategy.ts';

export type LocalSearchMethod = 'hill-climbing' | 'simulated-annealing';

export interface LocalSearchOptions {
  readonly coolingRate?: number;
  readonly initialTemperature?: number;
  readonly maxIterations?: number;
  readonly method?: LocalSearchMethod;
}

/**
 * Builds the strategy for `method` (simulated annealing by default), filling unset options with that
 * strategy's defaults.
 */
export function createLocalSearchStrategy(options: LocalSearchOptions = {}): LocalSearchStrategy {
  const method = options.method ?? 'simulated-annealing';
  switch (method) {
    case 'hill-climbing': {
      const hillClimbing: HillClimbingOptions = {
        maxIterations: options.maxIterations ?? DEFAULT_HILL_CLIMBING_OPTIONS.maxIterations
      };
      return new HillClimbingStrategy(hillClimbing);
    }
    case 'simulated-annealing': {
      const annealing: SimulatedAnnealingOptions = {
        coolingRate: options.coolingRate ?? DEFAULT_SIMULATED_ANNEALING_OPTIONS.coolingRate,
        initialTemperature: options.initialTemperature ?? DEFAULT_SIMULATED_ANNEALING_OPTIONS.initialTemperature,
        maxIterations: options.maxIterations ?? DEFAULT_SIMULATED_ANNEALING_OPTIONS.maxIterations
      };
      return new SimulatedAnnealingStrategy(annealing);
    }
    default: {
      const exhaustive: never = method;
      throw new Error(`Unknown local search method: ${String(exhaustive)}`);
    }
  }
}
