import { ensureNonNullable } from './typeGuards.ts';

export type Unit = readonly string[];

export const DIGITS = '123456789';
export const ROWS = 'ABCDEFGHI';
export const COLUMNS = DIGITS;

export const GRID_SIZE = 9;

const BOX_ROW_GROUPS = ['ABC', 'DEF', 'GHI'] as const;
const BOX_COLUMN_GROUPS = ['123', '456', '789'] as const;

/**
 * Cross product of the characters of `a` and the characters of `b`, concatenated pairwise.
 */
export function cross(a: string, b: string): string[] {
  const result: string[] = [];
  for (const x of a) {
    for (const y of b) {
      result.push(x + y);
    }
  }
  return result;
}

function freezeUnits(units: string[][]): readonly Unit[] {
  return Object.freeze(units.map((unit) => Object.freeze(unit)));
}

export const CELLS: readonly string[] = Object.freeze(cross(ROWS, COLUMNS));

export const COLUMN_UNITS: readonly Unit[] = freezeUnits(Array.from(COLUMNS, (c) => cross(ROWS, c)));
export const ROW_UNITS: readonly Unit[] = freezeUnits(Array.from(ROWS, (r) => cross(r, COLUMNS)));
export const BOX_UNITS: readonly Unit[] = freezeUnits(
  BOX_ROW_GROUPS.flatMap((rs) => BOX_COLUMN_GROUPS.map((cs) => cross(rs, cs)))
);

// Columns first, then rows, then boxes.
export const UNIT_LIST: readonly Unit[] = Object.freeze([...COLUMN_UNITS, ...ROW_UNITS, ...BOX_UNITS]);

const CELL_INDEX: Readonly<Record<string, number>> = Object.freeze(
  Object.fromEntries(CELLS.map((cell, index) => [cell, index] as const))
);

const UNITS_BY_CELL: Readonly<Record<string, readonly Unit[]>> = Object.freeze(
  Object.fromEntries(CELLS.map((cell) => [cell, Object.freeze(UNIT_LIST.filter((unit) => unit.includes(cell)))] as const))
);

const PEERS_BY_CELL: Readonly<Record<string, readonly string[]>> = Object.freeze(
  Object.fromEntries(CELLS.map((cell) => {
    const seen = new Set<string>();
    for (const unit of ensureNonNullable(UNITS_BY_CELL[cell])) {
      for (const other of unit) {
        if (other !== cell) {
          seen.add(other);
        }
      }
    }
    return [cell, Object.freeze([...seen])] as const;
  }))
);

const BOX_INDEX_BY_CELL: Readonly<Record<string, number>> = Object.freeze(
  Object.fromEntries(BOX_UNITS.flatMap((unit, boxIndex) => unit.map((cell) => [cell, boxIndex] as const)))
);

export function boxIndexOf(cell: string): number {
  return ensureNonNullable(BOX_INDEX_BY_CELL[cell], `Unknown cell: ${cell}`);
}

export function cellIndex(cell: string): number {
  return ensureNonNullable(CELL_INDEX[cell], `Unknown cell: ${cell}`);
}

export function isCell(value: string): boolean {
  return Object.hasOwn(CELL_INDEX, value);
}

export function peers(cell: string): readonly string[] {
  return ensureNonNullable(PEERS_BY_CELL[cell], `Unknown cell: ${cell}`);
}

/**
 * The three units containing `cell`: its column, its row and its box, in that order.
 */
export function units(cell: string): readonly Unit[] {
  return ensureNonNullable(UNITS_BY_CELL[cell], `Unknown cell: ${cell}`);
}
