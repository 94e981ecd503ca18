import {
  describe,
  expect,
  it
} from 'vitest';

import { PuzzleInputError } from '../src/errors.ts';
import {
  getCellRef,
  givens,
  gridValues,
  parseCellRef
} from '../src/parsers.ts';
import { SAMPLE_PUZZLE } from './puzzleTestHelper.ts';

describe('getCellRef', () => {
  it('converts row 1 col 1 to A1', () => {
    expect(getCellRef(1, 1)).toBe('A1');
  });

  it('converts row 3 col 2 to C2', () => {
    expect(getCellRef(3, 2)).toBe('C2');
  });
});

describe('parseCellRef', () => {
  it('parses I9', () => {
    expect(parseCellRef('I9')).toEqual({ columnId: 9, rowId: 9 });
  });

  it('is case-insensitive', () => {
    expect(parseCellRef('c2')).toEqual({ columnId: 2, rowId: 3 });
  });

  it('throws for refs outside the grid', () => {
    expect(() => parseCellRef('J1')).toThrow('Bad cell ref');
    expect(() => parseCellRef('A0')).toThrow('Bad cell ref');
  });
});

describe('gridValues', () => {
  it('maps cells in row-major order', () => {
    const values = gridValues(SAMPLE_PUZZLE);
    expect(values['A1']).toBe('0');
    expect(values['A3']).toBe('3');
    expect(values['B1']).toBe('9');
    expect(values['I7']).toBe('3');
  });

  it('drops noise characters before counting', () => {
    const framed = [
      '4 8 . |. . 1 |. . .',
      '. 6 . |. 4 . |8 2 1',
      '. . 1 |8 7 6 |4 . .',
      '------+------+------',
      '. 4 8 |. 3 2 |9 7 .',
      '. . 9 |5 . . |1 3 8',
      '1 . 6 |7 9 . |2 . .',
      '------+------+------',
      '3 . . |6 . . |. 1 .',
      '8 . . |. . . |7 . 9',
      '. 9 5 |. . 7 |3 8 2'
    ].join('\n');
    const values = gridValues(framed);
    expect(values['A1']).toBe('4');
    expect(values['A3']).toBe('.');
    expect(values['B9']).toBe('1');
    expect(values['I9']).toBe('2');
  });

  it('rejects 80 characters', () => {
    const short = SAMPLE_PUZZLE.slice(1);
    expect(() => gridValues(short)).toThrow(PuzzleInputError);
    try {
      gridValues(short);
    } catch (error) {
      expect(error).toBeInstanceOf(PuzzleInputError);
      expect(error).toMatchObject({ actualLength: 80, code: 'length' });
    }
  });

  it('rejects 82 characters', () => {
    expect(() => gridValues(`${SAMPLE_PUZZLE}1`)).toThrow('Expected 81 cells after filtering, got 82');
  });
});

describe('givens', () => {
  it('lists the filled cells with their digits', () => {
    const result = givens(SAMPLE_PUZZLE);
    expect(result).toHaveLength(32);
    expect(result[0]).toEqual({ cell: 'A3', digit: 3 });
    expect(result[1]).toEqual({ cell: 'A5', digit: 2 });
  });
});
