import type { Digit } from './typeGuards.ts';

import { CandidateStore } from './CandidateStore.ts';
import { givens } from './parsers.ts';
import {
  peers,
  units
} from './topology.ts';
import { ensureNonNullable } from './typeGuards.ts';

/**
 * Removes every other digit from `cell`, propagating each removal. Returns null on contradiction, in which
 * case the store may be partially updated and must be discarded.
 */
export function assign(store: CandidateStore, cell: string, digit: Digit): null | CandidateStore {
  const otherDigits = store.getCandidates(cell).filter((d) => d !== digit);
  for (const other of otherDigits) {
    if (!eliminate(store, cell, other)) {
      return null;
    }
  }
  return store;
}

/**
 * Removes `digit` from `cell` and propagates:
 * - a cell left with one digit has that digit removed from all of its peers;
 * - a unit left with one place for `digit` gets it assigned there.
 *
 * Returns null when a domain empties or a unit has no place left for `digit`.
 */
export function eliminate(store: CandidateStore, cell: string, digit: Digit): null | CandidateStore {
  if (!store.hasCandidate(cell, digit)) {
    return store;
  }

  const remaining = store.removeCandidate(cell, digit);
  if (remaining === 0) {
    return null;
  }
  if (remaining === 1) {
    const single = ensureNonNullable(store.getCandidates(cell)[0]);
    for (const peer of peers(cell)) {
      if (!eliminate(store, peer, single)) {
        return null;
      }
    }
  }

  for (const unit of units(cell)) {
    const places = unit.filter((s) => store.hasCandidate(s, digit));
    if (places.length === 0) {
      return null;
    }
    if (places.length === 1 && !assign(store, ensureNonNullable(places[0]), digit)) {
      return null;
    }
  }
  return store;
}

/**
 * Builds a fresh store and assigns every given digit of the puzzle. Throws `PuzzleInputError` on malformed
 * input; returns null if the givens contradict each other.
 */
export function parseGrid(puzzle: string): null | CandidateStore {
  const puzzleGivens = givens(puzzle);
  const store = CandidateStore.createFull();
  for (const { cell, digit } of puzzleGivens) {
    if (!assign(store, cell, digit)) {
      return null;
    }
  }
  return store;
}
