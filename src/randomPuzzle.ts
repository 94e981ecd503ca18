import type { RandomSource } from './random.ts';

import { CandidateStore } from './CandidateStore.ts';
import { assign } from './propagation.ts';
import {
  randomChoice,
  shuffled
} from './random.ts';
import { CELLS } from './topology.ts';

const DEFAULT_MIN_ASSIGNMENTS = 17;
const MIN_DISTINCT_DIGITS = 8;

/**
 * Makes a random puzzle with at least `minAssignments` solved cells, restarting on contradictions.
 * The result is not guaranteed to be solvable, nor to have a unique solution.
 */
export function randomPuzzle(random: RandomSource, minAssignments = DEFAULT_MIN_ASSIGNMENTS): string {
  let puzzle: null | string = null;
  while (puzzle === null) {
    puzzle = tryRandomPuzzle(random, minAssignments);
  }
  return puzzle;
}

function tryRandomPuzzle(random: RandomSource, minAssignments: number): null | string {
  const store = CandidateStore.createFull();
  for (const cell of shuffled(random, CELLS)) {
    if (!assign(store, cell, randomChoice(random, store.getCandidates(cell)))) {
      return null;
    }
    const solvedDigits = CELLS
      .map((s) => store.getCandidates(s))
      .filter((domain) => domain.length === 1)
      .flat();
    if (solvedDigits.length >= minAssignments && new Set(solvedDigits).size >= MIN_DISTINCT_DIGITS) {
      return CELLS.map((s) => {
        const domain = store.getCandidates(s);
        return domain.length === 1 ? domain.join('') : '.';
      }).join('');
    }
  }
  return null;
}
