import type { PassRecord } from './DeductionLoop.ts';
import type { Placement } from './Placement.ts';
import type { Strategy } from './strategies/Strategy.ts';
import type { SudokuGrid } from './SudokuGrid.ts';
import type { Duplicate } from './validation.ts';

import { DeductionLoop } from './DeductionLoop.ts';
import { findDuplicates } from './validation.ts';

export type SolveOutcome = DeductionOutcome | InvalidOutcome;

export interface SolveReporter {
  reportGrid(grid: SudokuGrid): void;
  reportInvalid(duplicates: readonly Duplicate[]): void;
  reportOutcome(outcome: SolveOutcome): void;
  reportPlacement(placement: Placement): void;
  reportStall(): void;
}

interface DeductionOutcome {
  readonly passes: readonly PassRecord[];
  readonly placementCount: number;
  readonly status: 'solved' | 'stalled';
}

interface InvalidOutcome {
  readonly duplicates: readonly Duplicate[];
  readonly status: 'invalid';
}

export const STALL_MESSAGE = 'No more unique intersections';

export function formatOutcome(outcome: SolveOutcome): string {
  switch (outcome.status) {
    case 'invalid':
      return 'Invalid Sudoku grid';
    case 'solved':
      return 'Sudoku solved!';
    case 'stalled':
      return 'Sudoku not solved: no remaining cell is forced by a row/column intersection';
    default: {
      const exhaustive: never = outcome;
      throw new Error(`Unknown outcome: ${String(exhaustive)}`);
    }
  }
}

export function formatPlacement(placement: Placement): string {
  return `Unique intersection at ${placement.ref} (row ${String(placement.rowIndex)}, column ${
    String(placement.columnIndex)
  }): ${String(placement.value)}`;
}

/**
 * Validates `grid`, then fills it in place by row/column intersection until nothing more is forced.
 *
 * An invalid starting grid is reported and left untouched.
 */
export function solveSudoku(grid: SudokuGrid, reporter: SolveReporter, strategy?: Strategy): SolveOutcome {
  const duplicates = findDuplicates(grid);
  if (duplicates.length > 0) {
    reporter.reportInvalid(duplicates);
    const invalid: InvalidOutcome = { duplicates, status: 'invalid' };
    reporter.reportOutcome(invalid);
    return invalid;
  }

  reporter.reportGrid(grid);
  const loop = new DeductionLoop(grid, {
    observer: {
      onPassApplied: (_record, current): void => {
        reporter.reportGrid(current);
      },
      onPlacement: (placement): void => {
        reporter.reportPlacement(placement);
      },
      onStalled: (): void => {
        reporter.reportStall();
      }
    },
    ...strategy !== undefined && { strategy }
  });
  const result = loop.run();

  const outcome: DeductionOutcome = {
    passes: result.passes,
    placementCount: result.placementCount,
    status: result.state
  };
  reporter.reportOutcome(outcome);
  return outcome;
}
