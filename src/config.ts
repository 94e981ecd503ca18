import type { HillClimbingOptions } from './strategies/HillClimbingStrategy.ts';
import type { SimulatedAnnealingOptions } from './strategies/SimulatedAnnealingStrategy.ts';

import yaml from 'js-yaml';
import { readFileSync } from 'node:fs';

import {
  DEFAULT_HILL_CLIMBING_OPTIONS,
  validateHillClimbingOptions
} from './strategies/HillClimbingStrategy.ts';
import {
  DEFAULT_SIMULATED_ANNEALING_OPTIONS,
  validateSimulatedAnnealingOptions
} from './strategies/SimulatedAnnealingStrategy.ts';
import { isRecord } from './typeGuards.ts';

export type SolveMethod = 'exact' | 'hill-climbing' | 'simulated-annealing';

export interface SolverConfig {
  readonly annealing: SimulatedAnnealingOptions;
  readonly hillClimbing: HillClimbingOptions;
  readonly method: SolveMethod;
  readonly seed?: number;
  /**
   * Puzzles taking longer than this are printed with their result; null never prints.
   */
  readonly showIfSlowerThanMs: null | number;
}

export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  annealing: DEFAULT_SIMULATED_ANNEALING_OPTIONS,
  hillClimbing: DEFAULT_HILL_CLIMBING_OPTIONS,
  method: 'exact',
  showIfSlowerThanMs: null
};

const SOLVE_METHODS: readonly SolveMethod[] = ['exact', 'hill-climbing', 'simulated-annealing'];

export function loadSolverConfig(path: string): SolverConfig {
  return parseSolverConfig(readFileSync(path, 'utf-8'));
}

/**
 * Parses a YAML solver config. Missing fields take their defaults; an empty document yields the defaults.
 */
export function parseSolverConfig(text: string): SolverConfig {
  const raw = yaml.load(text);
  if (raw === undefined || raw === null) {
    return DEFAULT_SOLVER_CONFIG;
  }
  if (!isRecord(raw)) {
    throw new Error('Solver config must be a mapping');
  }

  const seed = readOptionalInteger(raw, 'seed', 'seed');
  return {
    annealing: parseAnnealing(raw['annealing']),
    hillClimbing: parseHillClimbing(raw['hillClimbing']),
    method: parseMethod(raw['method']),
    showIfSlowerThanMs: parseShowIfSlowerThan(raw['showIfSlowerThanMs']),
    ...seed !== undefined && { seed }
  };
}

function parseAnnealing(value: unknown): SimulatedAnnealingOptions {
  const defaults = DEFAULT_SIMULATED_ANNEALING_OPTIONS;
  if (value === undefined || value === null) {
    return defaults;
  }
  if (!isRecord(value)) {
    throw new Error('annealing must be a mapping');
  }
  return validateSimulatedAnnealingOptions({
    coolingRate: readOptionalNumber(value, 'coolingRate', 'annealing.coolingRate') ?? defaults.coolingRate,
    initialTemperature: readOptionalNumber(value, 'initialTemperature', 'annealing.initialTemperature')
      ?? defaults.initialTemperature,
    maxIterations: readOptionalNumber(value, 'maxIterations', 'annealing.maxIterations') ?? defaults.maxIterations
  }, 'annealing.');
}

function parseHillClimbing(value: unknown): HillClimbingOptions {
  if (value === undefined || value === null) {
    return DEFAULT_HILL_CLIMBING_OPTIONS;
  }
  if (!isRecord(value)) {
    throw new Error('hillClimbing must be a mapping');
  }
  return validateHillClimbingOptions({
    maxIterations: readOptionalNumber(value, 'maxIterations', 'hillClimbing.maxIterations')
      ?? DEFAULT_HILL_CLIMBING_OPTIONS.maxIterations
  }, 'hillClimbing.');
}

function parseMethod(value: unknown): SolveMethod {
  if (value === undefined) {
    return DEFAULT_SOLVER_CONFIG.method;
  }
  const method = SOLVE_METHODS.find((m) => m === value);
  if (method === undefined) {
    throw new Error(`method must be one of ${SOLVE_METHODS.join(', ')}`);
  }
  return method;
}

function parseShowIfSlowerThan(value: unknown): null | number {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error('showIfSlowerThanMs must be a non-negative number or null');
  }
  return value;
}

function readOptionalInteger(record: Record<string, unknown>, key: string, label: string): number | undefined {
  const value = readOptionalNumber(record, key, label);
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new Error(`${label} must be a non-negative integer`);
  }
  return value;
}

function readOptionalNumber(record: Record<string, unknown>, key: string, label: string): number | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${label} must be a number`);
  }
  return value;
}
