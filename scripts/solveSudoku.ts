/**
 * Fill a Sudoku puzzle by row/column intersection and report whether that was enough.
 *
 * Usage:
 *     npm run solve                       (reads ./sudoku.csv)
 *     npm run solve puzzles/twoPasses.yaml
 *
 * Prints the grid before the first pass and after every pass that placed digits.
 * Exit code: 0 when the run completes (solved or stalled), 1 for an invalid or unreadable puzzle.
 */

/* eslint-disable no-console -- CLI script output. */

import type { Placement } from '../src/Placement.ts';
import type {
  SolveOutcome,
  SolveReporter
} from '../src/solveSudoku.ts';
import type { SudokuGrid } from '../src/SudokuGrid.ts';
import type { Duplicate } from '../src/validation.ts';

import { existsSync } from 'node:fs';

import {
  DEFAULT_PUZZLE_FILE,
  loadPuzzleFile
} from '../src/puzzleFile.ts';
import { renderGrid } from '../src/render.ts';
import {
  formatOutcome,
  formatPlacement,
  solveSudoku,
  STALL_MESSAGE
} from '../src/solveSudoku.ts';
import { describeDuplicate } from '../src/validation.ts';

enum ExitCodes {
  Success = 0,
  Failure = 1
}

const FIRST_CLI_ARG_INDEX = 2;

class ConsoleReporter implements SolveReporter {
  public readonly title: string | undefined;

  public constructor(title?: string) {
    this.title = title;
  }

  public reportGrid(grid: SudokuGrid): void {
    console.log(`\n${renderGrid(grid, this.title)}\n`);
  }

  public reportInvalid(duplicates: readonly Duplicate[]): void {
    for (const duplicate of duplicates) {
      console.error(`  ${describeDuplicate(duplicate)}`);
    }
  }

  public reportOutcome(outcome: SolveOutcome): void {
    if (outcome.status === 'invalid') {
      console.error(formatOutcome(outcome));
      return;
    }
    console.log(`${formatOutcome(outcome)} (${String(outcome.placementCount)} digits placed in ${
      String(outcome.passes.length)
    } passes)`);
  }

  public reportPlacement(placement: Placement): void {
    console.log(formatPlacement(placement));
  }

  public reportStall(): void {
    console.log(STALL_MESSAGE);
  }
}

function exitCodeFor(outcome: SolveOutcome): ExitCodes {
  switch (outcome.status) {
    case 'invalid':
      return ExitCodes.Failure;
    case 'solved':
    case 'stalled':
      return ExitCodes.Success;
    default: {
      const exhaustive: never = outcome;
      throw new Error(`Unknown outcome: ${String(exhaustive)}`);
    }
  }
}

function main(): void {
  const puzzlePath = process.argv[FIRST_CLI_ARG_INDEX] ?? DEFAULT_PUZZLE_FILE;
  if (!existsSync(puzzlePath)) {
    console.error(`Error: ${puzzlePath} not found`);
    process.exit(ExitCodes.Failure);
  }

  let outcome: SolveOutcome;
  try {
    const { grid, title } = loadPuzzleFile(puzzlePath);
    outcome = solveSudoku(grid, new ConsoleReporter(title));
  } catch (error: unknown) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(ExitCodes.Failure);
  }
  process.exit(exitCodeFor(outcome));
}

main();

/* eslint-enable no-console -- End CLI script output. */
