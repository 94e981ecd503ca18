import type { Configuration } from '../Configuration.ts';
import type { RandomSource } from '../random.ts';
import type {
  LocalSearchResult,
  LocalSearchStrategy
} from './LocalSearchStrategy.ts';

import { countConflicts } from '../conflicts.ts';
import { findBestNeighbor } from '../neighbors.ts';
import { assertIterationBudget } from './LocalSearchStrategy.ts';

export interface SimulatedAnnealingOptions {
  /**
   * Multiplicative temperature decay applied at the start of every iteration, in (0, 1).
   */
  readonly coolingRate: number;
  readonly initialTemperature: number;
  readonly maxIterations: number;
}

const DEFAULT_COOLING_RATE = 0.99;
const DEFAULT_INITIAL_TEMPERATURE = 1.15;
const DEFAULT_MAX_ITERATIONS = 500;

export const DEFAULT_SIMULATED_ANNEALING_OPTIONS: SimulatedAnnealingOptions = {
  coolingRate: DEFAULT_COOLING_RATE,
  initialTemperature: DEFAULT_INITIAL_TEMPERATURE,
  maxIterations: DEFAULT_MAX_ITERATIONS
};

/**
 * Annealing over the best in-box swap of a randomly sampled box, rather than over a single random swap.
 * The best neighbor is accepted when it lowers the conflict count, and otherwise with probability
 * `exp(-ΔE / T)`. This is the usual Metropolis sign: `ΔE >= 0` here, so `exp(ΔE / T)` would accept every
 * uphill move.
 */
export class SimulatedAnnealingStrategy implements LocalSearchStrategy {
  public readonly name = 'simulated-annealing';

  private readonly options: SimulatedAnnealingOptions;

  public constructor(options: SimulatedAnnealingOptions = DEFAULT_SIMULATED_ANNEALING_OPTIONS) {
    this.options = validateSimulatedAnnealingOptions(options);
  }

  public run(start: Configuration, random: RandomSource): LocalSearchResult {
    let current = start;
    let currentConflicts = countConflicts(current);
    let temperature = this.options.initialTemperature;

    for (let iteration = 0; iteration < this.options.maxIterations; iteration++) {
      temperature *= this.options.coolingRate;
      if (temperature === 0) {
        return { configuration: current, conflicts: currentConflicts, iterations: iteration, stopReason: 'frozen' };
      }
      if (currentConflicts === 0) {
        return { configuration: current, conflicts: 0, iterations: iteration, stopReason: 'solved' };
      }

      const neighbor = findBestNeighbor(current, random);
      const deltaE = neighbor.conflicts - currentConflicts;
      if (deltaE < 0 || random() < Math.exp(-deltaE / temperature)) {
        current = neighbor.configuration;
        currentConflicts = neighbor.conflicts;
      }

      if (currentConflicts === 0) {
        return { configuration: current, conflicts: 0, iterations: iteration + 1, stopReason: 'solved' };
      }
    }

    return {
      configuration: current,
      conflicts: currentConflicts,
      iterations: this.options.maxIterations,
      stopReason: 'budget'
    };
  }
}

/**
 * Returns `options` unchanged, or throws an `Error` naming the first invalid field prefixed with `fieldPrefix`.
 */
export function validateSimulatedAnnealingOptions(
  options: SimulatedAnnealingOptions,
  fieldPrefix = ''
): SimulatedAnnealingOptions {
  const { coolingRate, initialTemperature, maxIterations } = options;
  if (!(coolingRate > 0 && coolingRate < 1)) {
    throw new Error(`${fieldPrefix}coolingRate must be in (0, 1)`);
  }
  if (!Number.isFinite(initialTemperature) || initialTemperature < 0) {
    throw new Error(`${fieldPrefix}initialTemperature must be >= 0`);
  }
  assertIterationBudget(maxIterations, `${fieldPrefix}maxIterations`);
  return options;
}
