import type { CandidateStore } from './CandidateStore.ts';
import type { SolvedGrid } from './verification.ts';

import {
  assign,
  parseGrid
} from './propagation.ts';

/**
 * Depth-first search over the most constrained cell, trying its candidates in ascending order on a copy of
 * the store. Returns the first solved store found, or null.
 */
export function search(store: null | CandidateStore): null | CandidateStore {
  if (!store) {
    return null;
  }
  const cell = store.mostConstrainedCell();
  if (cell === null) {
    return store;
  }
  for (const digit of store.getCandidates(cell)) {
    const solved = search(assign(store.clone(), cell, digit));
    if (solved) {
      return solved;
    }
  }
  return null;
}

/**
 * Solves a puzzle exactly. Throws `PuzzleInputError` on malformed input; returns null when the puzzle has no
 * solution.
 */
export function solve(puzzle: string): null | SolvedGrid {
  return search(parseGrid(puzzle))?.toValues() ?? null;
}
