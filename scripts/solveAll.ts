/**
 * Solve every puzzle in a file and report timing.
 *
 * Usage:
 *     npm run solveAll fixtures/puzzles.txt [solver.yaml]
 *
 * The puzzle file holds one 81-character puzzle per line (`0` or `.` for blanks). The optional YAML file
 * selects the method (exact, hill-climbing, simulated-annealing), the random seed and the search parameters.
 */

/* eslint-disable no-console -- CLI script output. */

import type { PuzzleOutcome } from '../src/batch.ts';

import { existsSync } from 'node:fs';

import {
  formatSummary,
  fromFile,
  solveAll
} from '../src/batch.ts';
import {
  DEFAULT_SOLVER_CONFIG,
  loadSolverConfig
} from '../src/config.ts';
import { renderGrid } from '../src/display.ts';
import { gridValues } from '../src/parsers.ts';

const FIRST_CLI_ARG_INDEX = 2;
const MILLIS_PER_SECOND = 1000;
const SECONDS_DECIMALS = 2;

function main(): void {
  const [puzzlesPath, configPath] = process.argv.slice(FIRST_CLI_ARG_INDEX);
  if (puzzlesPath === undefined) {
    console.error('Usage: npm run solveAll <puzzles.txt> [solver.yaml]');
    process.exit(1);
  }
  for (const path of [puzzlesPath, configPath]) {
    if (path !== undefined && !existsSync(path)) {
      console.error(`Error: ${path} not found`);
      process.exit(1);
    }
  }

  const config = configPath === undefined ? DEFAULT_SOLVER_CONFIG : loadSolverConfig(configPath);
  const report = solveAll(fromFile(puzzlesPath), config);

  const threshold = config.showIfSlowerThanMs;
  if (threshold !== null) {
    for (const outcome of report.outcomes) {
      if (outcome.millis > threshold) {
        showOutcome(outcome);
      }
    }
  }

  if (report.total > 1) {
    console.log(formatSummary(report, config.method));
  }
}

function showOutcome(outcome: PuzzleOutcome): void {
  console.log(renderGrid(gridValues(outcome.puzzle)));
  console.log();
  if (outcome.values) {
    console.log(renderGrid(outcome.values));
  }
  if (outcome.conflicts !== null && outcome.conflicts > 0) {
    console.log(`Residual conflicts: ${String(outcome.conflicts)}`);
  }
  console.log(`(${(outcome.millis / MILLIS_PER_SECOND).toFixed(SECONDS_DECIMALS)} seconds)\n`);
}

main();

/* eslint-enable no-console -- End CLI script output. */
