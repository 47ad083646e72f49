import type {
  CellValue,
  Digit,
  SudokuGrid
} from './SudokuGrid.ts';

import {
  ALL_DIGITS,
  GRID_SIZE
} from './constants.ts';

/**
 * Digits 1-9 absent from one row or column. Iterates in ascending order.
 */
export type MissingSet = ReadonlySet<Digit>;

export interface MissingSets {
  readonly columns: readonly MissingSet[];
  readonly rows: readonly MissingSet[];
}

export function computeMissingSets(grid: SudokuGrid): MissingSets {
  return {
    columns: getMissingInColumns(grid),
    rows: getMissingInRows(grid)
  };
}

export function getMissingDigits(values: readonly CellValue[]): MissingSet {
  const present = new Set<CellValue>(values);
  const missing = new Set<Digit>();
  for (const digit of ALL_DIGITS) {
    if (!present.has(digit)) {
      missing.add(digit);
    }
  }
  return missing;
}

export function getMissingInColumns(grid: SudokuGrid): MissingSet[] {
  return Array.from({ length: GRID_SIZE }, (_, columnIndex) => getMissingDigits(grid.getColumn(columnIndex)));
}

export function getMissingInRows(grid: SudokuGrid): MissingSet[] {
  return Array.from({ length: GRID_SIZE }, (_, rowIndex) => getMissingDigits(grid.getRow(rowIndex)));
}
