import type { Configuration } from '../Configuration.ts';
import type { RandomSource } from '../random.ts';

export interface LocalSearchResult {
  readonly configuration: Configuration;
  readonly conflicts: number;
  readonly iterations: number;
  readonly stopReason: StopReason;
}

export interface LocalSearchStrategy {
  readonly name: string;
  run(start: Configuration, random: RandomSource): LocalSearchResult;
}

/**
 * - `solved`: a zero-conflict configuration was reached.
 * - `local-optimum`: no neighbor of the sampled box improved on the current configuration.
 * - `frozen`: the temperature reached zero.
 * - `budget`: the iteration cap was exhausted.
 */
export type StopReason = 'budget' | 'frozen' | 'local-optimum' | 'solved';

/**
 * Throws unless `maxIterations` is a non-negative integer; `label` names the field in the message.
 */
export function assertIterationBudget(maxIterations: number, label: string): void {
  if (!Number.isInteger(maxIterations) || maxIterations < 0) {
    throw new Error(`${label} must be a non-negative integer`);
  }
}
