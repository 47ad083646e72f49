import type { MissingSets } from './missingNumbers.ts';
import type {
  Digit,
  SudokuGrid
} from './SudokuGrid.ts';

import {
  EMPTY_CELL,
  GRID_SIZE
} from './constants.ts';
import { Placement } from './Placement.ts';
import { ensureNonNullable } from './typeGuards.ts';

export type PlacementListener = (placement: Placement) => void;

/**
 * Finds every empty cell whose row and column have exactly one missing digit in common.
 *
 * Cells are visited column by column (all rows of column 0, then column 1, ...), and
 * `onPlacement` fires for each placement as it is found, in that order. `missingSets`
 * must have been computed from `grid` as it is now; the grid is not modified.
 */
export function findUniqueIntersections(
  grid: SudokuGrid,
  missingSets: MissingSets,
  onPlacement?: PlacementListener
): Placement[] {
  const placements: Placement[] = [];
  for (let columnIndex = 0; columnIndex < GRID_SIZE; columnIndex++) {
    const missingInColumn = ensureNonNullable(missingSets.columns[columnIndex]);
    for (let rowIndex = 0; rowIndex < GRID_SIZE; rowIndex++) {
      if (grid.getValue(rowIndex, columnIndex) !== EMPTY_CELL) {
        continue;
      }
      const candidates = intersect(ensureNonNullable(missingSets.rows[rowIndex]), missingInColumn);
      const [candidate] = candidates;
      if (candidates.length !== 1 || candidate === undefined) {
        continue;
      }
      const placement = new Placement(rowIndex, columnIndex, candidate);
      placements.push(placement);
      onPlacement?.(placement);
    }
  }
  return placements;
}

export function intersect(a: ReadonlySet<Digit>, b: ReadonlySet<Digit>): Digit[] {
  return [...a].filter((digit) => b.has(digit));
}
