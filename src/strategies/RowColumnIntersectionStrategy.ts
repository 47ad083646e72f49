import type { PlacementListener } from '../intersections.ts';
import type { SudokuGrid } from '../SudokuGrid.ts';
import type {
  Strategy,
  StrategyResult
} from './Strategy.ts';

import { findUniqueIntersections } from '../intersections.ts';
import { computeMissingSets } from '../missingNumbers.ts';

/**
 * Places a digit wherever the row's and the column's missing digits share exactly one value.
 * Boxes are not consulted.
 */
export class RowColumnIntersectionStrategy implements Strategy {
  public tryApply(grid: SudokuGrid, onPlacement?: PlacementListener): null | StrategyResult {
    const placements = findUniqueIntersections(grid, computeMissingSets(grid), onPlacement);
    if (placements.length === 0) {
      return null;
    }
    const cellRefs = placements.map((p) => p.ref).join(', ');
    return {
      note: `Row/column intersection: ${cellRefs}`,
      placements
    };
  }
}
