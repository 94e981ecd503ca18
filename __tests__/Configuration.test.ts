import {
  describe,
  expect,
  it
} from 'vitest';

import { Configuration } from '../src/Configuration.ts';
import { PuzzleInputError } from '../src/errors.ts';
import { createSeededRandom } from '../src/random.ts';
import { CELLS } from '../src/topology.ts';
import { ensureNonNullable } from '../src/typeGuards.ts';
import {
  boxesArePermutations,
  SAMPLE_PUZZLE,
  SAMPLE_SOLUTION,
  SWAPPED_IN_FIRST_BOX,
  zeroRandom
} from './puzzleTestHelper.ts';

describe('Configuration', () => {
  describe('fromPuzzle', () => {
    it('keeps clues and marks blanks with 0', () => {
      const configuration = Configuration.fromPuzzle(SAMPLE_PUZZLE);
      expect(configuration.get('A1')).toBe(0);
      expect(configuration.get('A3')).toBe(3);
      expect(configuration.isFilled).toBe(false);
      expect(configuration.toString()).toBe(SAMPLE_PUZZLE);
    });

    it('reads dots as blanks', () => {
      expect(Configuration.fromPuzzle('.'.repeat(81)).toString()).toBe('0'.repeat(81));
    });
  });

  describe('fromRecord', () => {
    it('throws when a cell is missing', () => {
      expect(() => Configuration.fromRecord({ A1: 1 })).toThrow('Missing cell: A2');
    });
  });

  describe('fillBoxes', () => {
    it('fills every box with a permutation around the clues', () => {
      const puzzle = Configuration.fromPuzzle(SAMPLE_PUZZLE);
      const filled = puzzle.fillBoxes(createSeededRandom(1));
      expect(filled.isFilled).toBe(true);
      expect(boxesArePermutations(filled)).toBe(true);
      for (const cell of CELLS) {
        if (puzzle.get(cell) !== 0) {
          expect(filled.get(cell)).toBe(puzzle.get(cell));
        }
      }
    });

    it('leaves the original configuration untouched', () => {
      const puzzle = Configuration.fromPuzzle(SAMPLE_PUZZLE);
      puzzle.fillBoxes(createSeededRandom(1));
      expect(puzzle.toString()).toBe(SAMPLE_PUZZLE);
    });

    it('is reproducible with the same seed', () => {
      const puzzle = Configuration.fromPuzzle(SAMPLE_PUZZLE);
      expect(puzzle.fillBoxes(createSeededRandom(9)).toString())
        .toBe(puzzle.fillBoxes(createSeededRandom(9)).toString());
    });

    it('places the missing digits in shuffled order', () => {
      const puzzle = `0${SAMPLE_SOLUTION.slice(1, 10)}0${SAMPLE_SOLUTION.slice(11)}`;
      expect(Configuration.fromPuzzle(puzzle).fillBoxes(zeroRandom).toString()).toBe(SWAPPED_IN_FIRST_BOX.toString());
    });

    it('rejects a box with a repeated clue', () => {
      const clash = Configuration.fromPuzzle(`1${'0'.repeat(9)}1${'0'.repeat(70)}`);
      expect(() => clash.fillBoxes(zeroRandom)).toThrow(PuzzleInputError);
      expect(() => clash.fillBoxes(zeroRandom)).toThrow('Box 1 repeats clue 1');
    });
  });

  describe('getBoxNeighbors', () => {
    const solution = Configuration.fromPuzzle(SAMPLE_SOLUTION);

    it('returns all 36 in-box swaps in pair order', () => {
      const neighbors = solution.getBoxNeighbors(0);
      expect(neighbors).toHaveLength(36);
      expect(ensureNonNullable(neighbors[0]).toString()).toBe(solution.swap('A1', 'A2').toString());
      expect(ensureNonNullable(neighbors[35]).toString()).toBe(solution.swap('C2', 'C3').toString());
    });

    it('keeps every box a permutation', () => {
      for (const neighbor of solution.getBoxNeighbors(4)) {
        expect(boxesArePermutations(neighbor)).toBe(true);
      }
    });

    it('does not alias the source configuration', () => {
      solution.getBoxNeighbors(8);
      expect(solution.toString()).toBe(SAMPLE_SOLUTION);
    });

    it('rejects a box index outside 0-8', () => {
      expect(() => solution.getBoxNeighbors(9)).toThrow('Box index out of range: 9');
    });
  });

  describe('swap', () => {
    it('exchanges two cells in a copy', () => {
      const solution = Configuration.fromPuzzle(SAMPLE_SOLUTION);
      const swapped = solution.swap('A1', 'B2');
      expect(swapped.get('A1')).toBe(6);
      expect(swapped.get('B2')).toBe(4);
      expect(solution.get('A1')).toBe(4);
    });
  });
});
