import type { Placement } from './Placement.ts';
import type { Strategy } from './strategies/Strategy.ts';
import type { SudokuGrid } from './SudokuGrid.ts';

import { RowColumnIntersectionStrategy } from './strategies/RowColumnIntersectionStrategy.ts';
import { isSolvedSudoku } from './validation.ts';

export type DeductionState = 'running' | 'solved' | 'stalled';

export type TerminalState = Exclude<DeductionState, 'running'>;

export interface DeductionLoopOptions {
  readonly observer?: DeductionObserver;
  readonly strategy?: Strategy;
}

export interface DeductionObserver {
  onPassApplied?(record: PassRecord, grid: SudokuGrid): void;
  onPlacement?(placement: Placement, pass: number): void;
  onStalled?(pass: number): void;
}

export interface DeductionResult {
  readonly passes: readonly PassRecord[];
  readonly placementCount: number;
  readonly state: TerminalState;
}

export interface PassRecord {
  readonly note: string;
  readonly pass: number;
  readonly placements: readonly Placement[];
}

/**
 * Applies a strategy pass after pass until it stops producing placements or the grid is solved.
 *
 * All placements of one pass are computed before any of them is written, so they never see
 * each other. Each pass that continues the loop fills at least one empty cell, hence at most
 * 81 passes run. The loop does not re-validate the grid between passes.
 */
export class DeductionLoop {
  public get passes(): readonly PassRecord[] {
    return this._passes;
  }

  public get state(): DeductionState {
    return this._state;
  }

  private readonly _passes: PassRecord[] = [];
  private _state: DeductionState = 'running';
  private readonly observer: DeductionObserver;
  private readonly strategy: Strategy;

  /**
   * @param grid - Must already have passed `isValidSudoku`; it is modified in place.
   */
  public constructor(private readonly grid: SudokuGrid, options: DeductionLoopOptions = {}) {
    this.observer = options.observer ?? {};
    this.strategy = options.strategy ?? new RowColumnIntersectionStrategy();
  }

  public run(): DeductionResult {
    let state = this.step();
    while (state === 'running') {
      state = this.step();
    }
    return {
      passes: this._passes,
      placementCount: this._passes.reduce((sum, record) => sum + record.placements.length, 0),
      state
    };
  }

  /**
   * Runs at most one pass and returns the state afterwards. A no-op once the loop has terminated.
   */
  public step(): DeductionState {
    if (this._state !== 'running') {
      return this._state;
    }
    if (isSolvedSudoku(this.grid)) {
      this._state = 'solved';
      return this._state;
    }

    const pass = this._passes.length + 1;
    const result = this.strategy.tryApply(this.grid, (placement) => {
      this.observer.onPlacement?.(placement, pass);
    });
    if (!result) {
      this.observer.onStalled?.(pass);
      this._state = isSolvedSudoku(this.grid) ? 'solved' : 'stalled';
      return this._state;
    }

    for (const placement of result.placements) {
      placement.applyTo(this.grid);
    }
    const record: PassRecord = { note: result.note, pass, placements: result.placements };
    this._passes.push(record);
    this.observer.onPassApplied?.(record, this.grid);
    return this._state;
  }
}
