import type { Configuration } from './Configuration.ts';
import type { RandomSource } from './random.ts';

import { countConflicts } from './conflicts.ts';
import { randomInt } from './random.ts';
import { GRID_SIZE } from './topology.ts';

export interface ScoredConfiguration {
  readonly configuration: Configuration;
  readonly conflicts: number;
}

/**
 * Picks a box at random and returns its in-box swap with the fewest conflicts. Ties keep the earliest pair.
 */
export function findBestNeighbor(configuration: Configuration, random: RandomSource): ScoredConfiguration {
  return findBestNeighborInBox(configuration, randomInt(random, GRID_SIZE));
}

export function findBestNeighborInBox(configuration: Configuration, boxIndex: number): ScoredConfiguration {
  let best: null | ScoredConfiguration = null;
  for (const neighbor of configuration.getBoxNeighbors(boxIndex)) {
    const conflicts = countConflicts(neighbor);
    if (!best || conflicts < best.conflicts) {
      best = { configuration: neighbor, conflicts };
    }
  }
  if (!best) {
    throw new Error(`Box ${String(boxIndex + 1)} has no neighbors`);
  }
  return best;
}
