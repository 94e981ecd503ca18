import { PuzzleInputError } from './errors.ts';
import {
  CELLS,
  COLUMNS,
  DIGITS,
  ROWS
} from './topology.ts';
import {
  type Digit,
  ensureDigit,
  ensureNonNullable
} from './typeGuards.ts';

export interface CellRef {
  readonly columnId: number;
  readonly rowId: number;
}

export interface Given {
  readonly cell: string;
  readonly digit: Digit;
}

const BLANK_CHARS = '0.';
const CELL_COUNT = 81;
const CHAR_CODE_A = 65;

export function getCellRef(rowId: number, columnId: number): string {
  return String.fromCharCode(CHAR_CODE_A + rowId - 1) + String(columnId);
}

/**
 * Cells holding a digit in the puzzle, in row-major order.
 */
export function givens(puzzle: string): Given[] {
  const values = gridValues(puzzle);
  const result: Given[] = [];
  for (const cell of CELLS) {
    const ch = ensureNonNullable(values[cell]);
    if (DIGITS.includes(ch)) {
      result.push({ cell, digit: ensureDigit(parseInt(ch, 10)) });
    }
  }
  return result;
}

/**
 * Maps every cell to its puzzle character. Characters other than digits, `0` and `.` are dropped first;
 * exactly 81 must remain.
 */
export function gridValues(puzzle: string): Record<string, string> {
  const chars = Array.from(puzzle).filter((ch) => DIGITS.includes(ch) || BLANK_CHARS.includes(ch));
  if (chars.length !== CELL_COUNT) {
    throw new PuzzleInputError(
      `Expected ${String(CELL_COUNT)} cells after filtering, got ${String(chars.length)}`,
      { actualLength: chars.length, code: 'length' }
    );
  }
  const result: Record<string, string> = {};
  CELLS.forEach((cell, index) => {
    result[cell] = ensureNonNullable(chars[index]);
  });
  return result;
}

export function parseCellRef(token: string): CellRef {
  const m = /^(?<row>[A-I])(?<col>[1-9])$/.exec(token.trim().toUpperCase());
  if (!m) {
    throw new Error(`Bad cell ref: ${token}`);
  }
  const groups = ensureNonNullable(m.groups);
  return {
    columnId: COLUMNS.indexOf(ensureNonNullable(groups['col'])) + 1,
    rowId: ROWS.indexOf(ensureNonNullable(groups['row'])) + 1
  };
}
