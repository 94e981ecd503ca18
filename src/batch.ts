import type { SolverConfig } from './config.ts';
import type { RandomSource } from './random.ts';

import { readFileSync } from 'node:fs';

import { solveApprox } from './localSearch.ts';
import { createSeededRandom } from './random.ts';
import { solve } from './search.ts';
import { isSolved } from './verification.ts';

export interface BatchReport {
  readonly averageMillis: number;
  readonly hertz: number;
  readonly maxMillis: number;
  readonly outcomes: readonly PuzzleOutcome[];
  readonly solvedCount: number;
  readonly total: number;
}

export type Clock = () => number;

export interface PuzzleOutcome {
  /**
   * Residual row/column conflicts; always 0 for the exact method when it succeeds.
   */
  readonly conflicts: null | number;
  readonly millis: number;
  readonly puzzle: string;
  readonly solved: boolean;
  readonly values: null | Readonly<Record<string, number>>;
}

const MILLIS_PER_SECOND = 1000;
const SUMMARY_DECIMALS = 2;

export function formatSummary(report: BatchReport, name = ''): string {
  const subject = ['Solved', String(report.solvedCount), 'of', String(report.total), name, 'puzzles']
    .filter((word) => word !== '')
    .join(' ');
  const avg = (report.averageMillis / MILLIS_PER_SECOND).toFixed(SUMMARY_DECIMALS);
  const max = (report.maxMillis / MILLIS_PER_SECOND).toFixed(SUMMARY_DECIMALS);
  return `${subject} (avg ${avg} secs (${String(Math.trunc(report.hertz))} Hz), max ${max} secs).`;
}

/**
 * Reads a puzzle file and splits it into entries, dropping blank ones.
 */
export function fromFile(path: string, separator = '\n'): string[] {
  return readFileSync(path, 'utf-8')
    .trim()
    .split(separator)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

export function solveAll(
  puzzles: readonly string[],
  config: SolverConfig,
  now: Clock = (): number => performance.now()
): BatchReport {
  const random = createSeededRandom(config.seed);
  const outcomes = puzzles.map((puzzle) => {
    const start = now();
    const { conflicts, values } = solveWith(puzzle, config, random);
    const millis = now() - start;
    return { conflicts, millis, puzzle, solved: isSolved(values), values };
  });

  const total = outcomes.length;
  const totalMillis = outcomes.reduce((sum, outcome) => sum + outcome.millis, 0);
  return {
    averageMillis: total > 0 ? totalMillis / total : 0,
    hertz: totalMillis > 0 ? total / (totalMillis / MILLIS_PER_SECOND) : 0,
    maxMillis: Math.max(0, ...outcomes.map((outcome) => outcome.millis)),
    outcomes,
    solvedCount: outcomes.filter((outcome) => outcome.solved).length,
    total
  };
}

function solveWith(
  puzzle: string,
  config: SolverConfig,
  random: RandomSource
): Pick<PuzzleOutcome, 'conflicts' | 'values'> {
  switch (config.method) {
    case 'exact': {
      const values = solve(puzzle);
      return { conflicts: values ? 0 : null, values };
    }
    case 'hill-climbing': {
      const result = solveApprox(puzzle, { ...config.hillClimbing, method: 'hill-climbing', random });
      return { conflicts: result.conflicts, values: result.configuration.toRecord() };
    }
    case 'simulated-annealing': {
      const result = solveApprox(puzzle, { ...config.annealing, method: 'simulated-annealing', random });
      return { conflicts: result.conflicts, values: result.configuration.toRecord() };
    }
    default: {
      const exhaustive: never = config.method;
      throw new Error(`Unknown solve method: ${String(exhaustive)}`);
    }
  }
}
