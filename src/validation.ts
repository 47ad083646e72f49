import type {
  Digit,
  HouseType,
  SudokuGrid
} from './SudokuGrid.ts';

import {
  EMPTY_CELL,
  GRID_SIZE
} from './constants.ts';
import { HOUSE_TYPES } from './SudokuGrid.ts';

const CHAR_CODE_A = 65;

export interface Duplicate {
  readonly house: HouseType;
  readonly index: number;
  readonly value: Digit;
}

export function describeDuplicate(duplicate: Duplicate): string {
  return `${houseLabel(duplicate.house, duplicate.index)} contains ${String(duplicate.value)} more than once`;
}

/**
 * Lists every row, column and box holding a digit more than once, one entry per repeated digit.
 * Empty cells are ignored.
 */
export function findDuplicates(grid: SudokuGrid): Duplicate[] {
  const duplicates: Duplicate[] = [];
  for (const house of HOUSE_TYPES) {
    for (let index = 0; index < GRID_SIZE; index++) {
      const seen = new Set<Digit>();
      const repeated = new Set<Digit>();
      for (const value of grid.getHouse(house, index)) {
        if (value === EMPTY_CELL) {
          continue;
        }
        if (seen.has(value)) {
          repeated.add(value);
        }
        seen.add(value);
      }
      for (const value of repeated) {
        duplicates.push({ house, index, value });
      }
    }
  }
  return duplicates;
}

export function houseLabel(house: HouseType, index: number): string {
  switch (house) {
    case 'box':
      return `Box ${String(index + 1)}`;
    case 'column':
      return `Column ${String.fromCharCode(CHAR_CODE_A + index)}`;
    case 'row':
      return `Row ${String(index + 1)}`;
    default: {
      const exhaustive: never = house;
      throw new Error(`Unknown house type: ${String(exhaustive)}`);
    }
  }
}

export function isSolvedSudoku(grid: SudokuGrid): boolean {
  return grid.isFull && isValidSudoku(grid);
}

export function isValidSudoku(grid: SudokuGrid): boolean {
  return findDuplicates(grid).length === 0;
}
