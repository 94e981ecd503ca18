import type { Configuration } from './Configuration.ts';
import type { Unit } from './topology.ts';

import {
  COLUMN_UNITS,
  ROW_UNITS
} from './topology.ts';
import { ensureNonNullable } from './typeGuards.ts';

/**
 * Number of unordered pairs of cells sharing a row or a column and holding the same non-zero digit.
 */
export function countConflicts(configuration: Configuration): number {
  return countUnitConflicts(configuration, ROW_UNITS) + countUnitConflicts(configuration, COLUMN_UNITS);
}

function countUnitConflicts(configuration: Configuration, unitList: readonly Unit[]): number {
  let conflicts = 0;
  for (const unit of unitList) {
    const values = unit.map((cell) => configuration.get(cell));
    for (let i = 0; i < values.length; i++) {
      const value = ensureNonNullable(values[i]);
      if (value === 0) {
        continue;
      }
      for (let j = i + 1; j < values.length; j++) {
        if (values[j] === value) {
          conflicts++;
        }
      }
    }
  }
  return conflicts;
}
