import {
  describe,
  expect,
  it
} from 'vitest';

import { CandidateStore } from '../src/CandidateStore.ts';
import { Configuration } from '../src/Configuration.ts';
import { renderGrid } from '../src/display.ts';
import { gridValues } from '../src/parsers.ts';
import {
  SAMPLE_PUZZLE,
  SAMPLE_SOLUTION
} from './puzzleTestHelper.ts';

describe('renderGrid', () => {
  it('renders a solved grid with box separators', () => {
    const lines = renderGrid(Configuration.fromPuzzle(SAMPLE_SOLUTION).toRecord()).split('\n');
    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe('4 8 3 |9 2 1 |6 5 7 ');
    expect(lines[3]).toBe('------+------+------');
    expect(lines[7]).toBe('------+------+------');
    expect(lines[10]).toBe('6 9 5 |4 1 7 |3 8 2 ');
  });

  it('renders raw puzzle characters', () => {
    const lines = renderGrid(gridValues(SAMPLE_PUZZLE)).split('\n');
    expect(lines[0]).toBe('0 0 3 |0 2 0 |6 0 0 ');
  });

  it('widens columns to fit candidate lists', () => {
    const lines = renderGrid(CandidateStore.createFull().toCandidateStrings()).split('\n');
    const block = '123456789 '.repeat(3);
    expect(lines[0]).toBe(`${block}|${block}|${block}`);
    expect(lines[3]).toBe(['-'.repeat(30), '-'.repeat(30), '-'.repeat(30)].join('+'));
  });

  it('throws when a cell is missing', () => {
    expect(() => renderGrid({ A1: 1 })).toThrow('Missing cell: A2');
  });
});
