import type { SolvedGrid } from './verification.ts';

import {
  CELLS,
  DIGITS
} from './topology.ts';
import {
  type Digit,
  ensureDigit,
  ensureNonNullable
} from './typeGuards.ts';

const ALL_DIGITS: readonly Digit[] = Object.freeze(Array.from(DIGITS, (ch) => ensureDigit(Number(ch))));

/**
 * Per-cell domains of the digits still admissible during exact solving.
 *
 * Domains are immutable arrays replaced on every removal, so `clone` only copies the cell-to-domain map and
 * siblings in the search tree never observe each other's changes.
 */
export class CandidateStore {
  public get isSolved(): boolean {
    for (const domain of this.domains.values()) {
      if (domain.length !== 1) {
        return false;
      }
    }
    return true;
  }

  private constructor(private readonly domains: Map<string, readonly Digit[]>) {
  }

  public static createFull(): CandidateStore {
    return new CandidateStore(new Map(CELLS.map((cell) => [cell, ALL_DIGITS])));
  }

  public candidateCount(cell: string): number {
    return this.getCandidates(cell).length;
  }

  public clone(): CandidateStore {
    return new CandidateStore(new Map(this.domains));
  }

  public getCandidates(cell: string): readonly Digit[] {
    return ensureNonNullable(this.domains.get(cell), `Unknown cell: ${cell}`);
  }

  public hasCandidate(cell: string, digit: Digit): boolean {
    return this.getCandidates(cell).includes(digit);
  }

  /**
   * The first unsolved cell with the fewest candidates, or null when every cell is solved.
   */
  public mostConstrainedCell(): null | string {
    let best: null | string = null;
    let bestCount = Infinity;
    for (const cell of CELLS) {
      const count = this.candidateCount(cell);
      if (count > 1 && count < bestCount) {
        best = cell;
        bestCount = count;
      }
    }
    return best;
  }

  /**
   * Returns the number of candidates left in the cell.
   */
  public removeCandidate(cell: string, digit: Digit): number {
    const remaining = this.getCandidates(cell).filter((d) => d !== digit);
    this.domains.set(cell, Object.freeze(remaining));
    return remaining.length;
  }

  /**
   * Candidates joined into one string per cell, for rendering partial grids.
   */
  public toCandidateStrings(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const cell of CELLS) {
      result[cell] = this.getCandidates(cell).join('');
    }
    return result;
  }

  /**
   * The cell-to-digit mapping, or null while any domain still has other than exactly one digit.
   */
  public toValues(): null | SolvedGrid {
    const result: Record<string, Digit> = {};
    for (const cell of CELLS) {
      const domain = this.getCandidates(cell);
      if (domain.length !== 1) {
        return null;
      }
      result[cell] = ensureNonNullable(domain[0]);
    }
    return result;
  }
}
