import {
  CELLS,
  COLUMNS,
  ROWS
} from './topology.ts';
import { ensureNonNullable } from './typeGuards.ts';

const BOX_BLOCKS = 3;
const BOX_END_COLUMNS = '36';
const BOX_END_ROWS = 'CF';
const HALVES = 2;

/**
 * Renders a grid as text: one line per row, `|` after columns 3 and 6, and a dashed separator after rows C
 * and F. Each value is centred in a column one character wider than the widest value.
 */
export function renderGrid(values: Readonly<Record<string, number | string>>): string {
  const width = 1 + Math.max(...CELLS.map((cell) => cellText(values, cell).length));
  const separator = Array.from({ length: BOX_BLOCKS }, () => '-'.repeat(width * BOX_BLOCKS)).join('+');
  const lines: string[] = [];
  for (const row of ROWS) {
    let line = '';
    for (const column of COLUMNS) {
      line += center(cellText(values, row + column), width);
      if (BOX_END_COLUMNS.includes(column)) {
        line += '|';
      }
    }
    lines.push(line);
    if (BOX_END_ROWS.includes(row)) {
      lines.push(separator);
    }
  }
  return lines.join('\n');
}

function cellText(values: Readonly<Record<string, number | string>>, cell: string): string {
  return String(ensureNonNullable(values[cell], `Missing cell: ${cell}`));
}

function center(text: string, width: number): string {
  const padding = Math.max(width - text.length, 0);
  const left = Math.floor(padding / HALVES);
  return ' '.repeat(left) + text + ' '.repeat(padding - left);
}
