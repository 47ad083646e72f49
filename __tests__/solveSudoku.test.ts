import {
  describe,
  expect,
  it,
  vi
} from 'vitest';

import type { Strategy } from '../src/strategies/Strategy.ts';

import { Placement } from '../src/Placement.ts';
import {
  formatOutcome,
  formatPlacement,
  solveSudoku
} from '../src/solveSudoku.ts';
import { SudokuGrid } from '../src/SudokuGrid.ts';
import {
  RecordingReporter,
  SOLVED_ROWS,
  STALLING_ROWS,
  TWO_PASS_ROWS
} from './gridTestHelper.ts';

describe('solveSudoku', () => {
  it('reports the start grid, each pass and the solved outcome', () => {
    const reporter = new RecordingReporter();
    const outcome = solveSudoku(new SudokuGrid(TWO_PASS_ROWS), reporter);
    expect(outcome.status).toBe('solved');
    expect(reporter.events).toEqual([
      'grid',
      'placement:A3=7',
      'placement:B9=1',
      'placement:C1=3',
      'placement:D2=7',
      'placement:F6=4',
      'placement:I3=6',
      'grid',
      'placement:F1=6',
      'placement:F3=3',
      'grid',
      'outcome:solved'
    ]);
    expect(reporter.grids[0]).toEqual(TWO_PASS_ROWS);
    expect(reporter.grids[2]).toEqual(SOLVED_ROWS);
  });

  it('reports a stall when the technique runs out', () => {
    const reporter = new RecordingReporter();
    const outcome = solveSudoku(new SudokuGrid(STALLING_ROWS), reporter);
    expect(reporter.events).toEqual(['grid', 'placement:I9=8', 'grid', 'stall', 'outcome:stalled']);
    expect(outcome).toMatchObject({ placementCount: 1, status: 'stalled' });
  });

  it('stops before deduction when the grid has repeats', () => {
    const rows = SudokuGrid.empty().toRows().map((row, rowIndex) => (rowIndex === 0 ? [5, 3, 0, 0, 7, 0, 0, 0, 5] : row));
    const grid = new SudokuGrid(rows);
    const reporter = new RecordingReporter();
    const outcome = solveSudoku(grid, reporter);
    expect(outcome).toEqual({ duplicates: [{ house: 'row', index: 0, value: 5 }], status: 'invalid' });
    expect(reporter.events).toEqual(['invalid:1', 'outcome:invalid']);
    expect(grid.toRows()).toEqual(rows);
  });

  it('deduces with the given strategy', () => {
    const strategy: Strategy = { tryApply: vi.fn(() => null) };
    const grid = new SudokuGrid(TWO_PASS_ROWS);
    const reporter = new RecordingReporter();
    const outcome = solveSudoku(grid, reporter, strategy);
    expect(strategy.tryApply).toHaveBeenCalledTimes(1);
    expect(reporter.events).toEqual(['grid', 'stall', 'outcome:stalled']);
    expect(outcome).toEqual({ passes: [], placementCount: 0, status: 'stalled' });
    expect(grid.toRows()).toEqual(TWO_PASS_ROWS);
  });

  it('reports an empty board as stalled without placements', () => {
    const reporter = new RecordingReporter();
    const outcome = solveSudoku(SudokuGrid.empty(), reporter);
    expect(reporter.events).toEqual(['grid', 'stall', 'outcome:stalled']);
    expect(outcome).toEqual({ passes: [], placementCount: 0, status: 'stalled' });
  });
});

describe('formatPlacement', () => {
  it('shows the cell ref and 0-based indexes', () => {
    expect(formatPlacement(new Placement(6, 0, 3))).toBe('Unique intersection at A7 (row 6, column 0): 3');
  });
});

describe('formatOutcome', () => {
  it('describes each outcome', () => {
    expect(formatOutcome({ passes: [], placementCount: 0, status: 'solved' })).toBe('Sudoku solved!');
    expect(formatOutcome({ passes: [], placementCount: 0, status: 'stalled' }))
      .toBe('Sudoku not solved: no remaining cell is forced by a row/column intersection');
    expect(formatOutcome({ duplicates: [], status: 'invalid' })).toBe('Invalid Sudoku grid');
  });
});
