import type { PlacementListener } from '../intersections.ts';
import type { Placement } from '../Placement.ts';
import type { SudokuGrid } from '../SudokuGrid.ts';

export interface Strategy {
  tryApply(grid: SudokuGrid, onPlacement?: PlacementListener): null | StrategyResult;
}

export interface StrategyResult {
  readonly note: string;
  readonly placements: readonly Placement[];
}
