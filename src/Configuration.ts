import type { RandomSource } from './random.ts';

import { PuzzleInputError } from './errors.ts';
import { gridValues } from './parsers.ts';
import { shuffled } from './random.ts';
import {
  BOX_UNITS,
  CELLS,
  cellIndex,
  DIGITS
} from './topology.ts';
import { ensureNonNullable } from './typeGuards.ts';

const BLANK = 0;

/**
 * A total assignment of the 81 cells used by local search. Unfilled cells hold 0 until `fillBoxes` runs.
 * Instances are immutable: every change produces a new configuration.
 */
export class Configuration {
  public get isFilled(): boolean {
    return !this.values.includes(BLANK);
  }

  private constructor(private readonly values: readonly number[]) {
  }

  public static fromPuzzle(puzzle: string): Configuration {
    const chars = gridValues(puzzle);
    return new Configuration(CELLS.map((cell) => {
      const ch = ensureNonNullable(chars[cell]);
      return DIGITS.includes(ch) ? parseInt(ch, 10) : BLANK;
    }));
  }

  public static fromRecord(record: Readonly<Record<string, number>>): Configuration {
    return new Configuration(CELLS.map((cell) => ensureNonNullable(record[cell], `Missing cell: ${cell}`)));
  }

  /**
   * Fills the blanks of each box with a random permutation of the digits missing from that box. Clues stay
   * where they are.
   */
  public fillBoxes(random: RandomSource): Configuration {
    const values = [...this.values];
    BOX_UNITS.forEach((box, boxIndex) => {
      const present = new Set<number>();
      const blanks: number[] = [];
      for (const cell of box) {
        const index = cellIndex(cell);
        const value = ensureNonNullable(values[index]);
        if (value === BLANK) {
          blanks.push(index);
        } else if (present.has(value)) {
          throw new PuzzleInputError(
            `Box ${String(boxIndex + 1)} repeats clue ${String(value)}`,
            { code: 'box-clash' }
          );
        } else {
          present.add(value);
        }
      }
      const missing = shuffled(random, Array.from(DIGITS, Number).filter((d) => !present.has(d)));
      blanks.forEach((index, i) => {
        values[index] = ensureNonNullable(missing[i]);
      });
    });
    return new Configuration(values);
  }

  public get(cell: string): number {
    return this.getAt(cellIndex(cell));
  }

  public getAt(index: number): number {
    return ensureNonNullable(this.values[index], `Cell index out of range: ${String(index)}`);
  }

  /**
   * The 36 configurations obtained by swapping one pair of cells inside the box, pairs in lexicographic order
   * of their positions within the box.
   */
  public getBoxNeighbors(boxIndex: number): Configuration[] {
    const box = ensureNonNullable(BOX_UNITS[boxIndex], `Box index out of range: ${String(boxIndex)}`);
    const neighbors: Configuration[] = [];
    for (let i = 0; i < box.length; i++) {
      for (let j = i + 1; j < box.length; j++) {
        neighbors.push(this.swap(ensureNonNullable(box[i]), ensureNonNullable(box[j])));
      }
    }
    return neighbors;
  }

  public swap(cellA: string, cellB: string): Configuration {
    const values = [...this.values];
    const indexA = cellIndex(cellA);
    const indexB = cellIndex(cellB);
    values[indexA] = this.getAt(indexB);
    values[indexB] = this.getAt(indexA);
    return new Configuration(values);
  }

  public toRecord(): Record<string, number> {
    const result: Record<string, number> = {};
    CELLS.forEach((cell, index) => {
      result[cell] = this.getAt(index);
    });
    return result;
  }

  public toString(): string {
    return this.values.join('');
  }
}
