import type { Digit } from './typeGuards.ts';

import {
  GRID_SIZE,
  UNIT_LIST
} from './topology.ts';

export type SolvedGrid = Readonly<Record<string, Digit>>;

/**
 * True when every row, column and box holds each digit 1-9 exactly once.
 */
export function isSolved(values: null | Readonly<Record<string, number>>): boolean {
  if (!values) {
    return false;
  }
  return UNIT_LIST.every((unit) => {
    const seen = new Set<number>();
    for (const cell of unit) {
      const value = values[cell];
      if (value === undefined || value < 1 || value > GRID_SIZE) {
        return false;
      }
      seen.add(value);
    }
    return seen.size === GRID_SIZE;
  });
}
