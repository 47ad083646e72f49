import type { Digit } from './SudokuGrid.ts';

export const GRID_SIZE = 9;
export const BOX_SIZE = 3;
export const EMPTY_CELL = 0;

/* eslint-disable no-magic-numbers -- The digit alphabet is literal. */
export const ALL_DIGITS: ReadonlySet<Digit> = new Set<Digit>([1, 2, 3, 4, 5, 6, 7, 8, 9]);
/* eslint-enable no-magic-numbers -- End digit alphabet. */
