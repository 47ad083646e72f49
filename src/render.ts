import type { SudokuGrid } from './SudokuGrid.ts';

import {
  BOX_SIZE,
  EMPTY_CELL
} from './constants.ts';

const RULE_WIDTH = 37;
const BOX_WIDTH = 7;
const HALF = 2;
const RULE = '═'.repeat(RULE_WIDTH);
const BOX_RULE = '─'.repeat(BOX_WIDTH);
const BAND_SEPARATOR = `├${BOX_RULE}┼${BOX_RULE}┼${BOX_RULE}┤`;
const EMPTY_CELL_MARK = '·';

export const DEFAULT_TITLE = 'SUDOKU PUZZLE';

/**
 * Draws the grid with box separators, `·` for empty cells:
 *
 * ```
 * │ 5 3 · │ · 7 · │ · · · │
 * ```
 */
export function renderGrid(grid: SudokuGrid, title = DEFAULT_TITLE): string {
  const padding = ' '.repeat(Math.max(0, Math.floor((RULE_WIDTH - title.length) / HALF)));
  const lines = [RULE, padding + title, RULE];
  for (const [rowIndex, row] of grid.toRows().entries()) {
    if (rowIndex % BOX_SIZE === 0 && rowIndex > 0) {
      lines.push(BAND_SEPARATOR);
    }
    let line = '│ ';
    for (const [columnIndex, value] of row.entries()) {
      if (columnIndex % BOX_SIZE === 0 && columnIndex > 0) {
        line += '│ ';
      }
      line += `${value === EMPTY_CELL ? EMPTY_CELL_MARK : String(value)} `;
    }
    lines.push(`${line}│`);
  }
  lines.push(RULE);
  return lines.join('\n');
}
