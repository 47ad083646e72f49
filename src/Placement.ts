import type {
  Digit,
  SudokuGrid
} from './SudokuGrid.ts';

import { getCellRef } from './cellRefs.ts';

/**
 * A deduced digit for a cell that was empty when the pass started.
 */
export class Placement {
  public readonly ref: string;

  public constructor(
    public readonly rowIndex: number,
    public readonly columnIndex: number,
    public readonly value: Digit
  ) {
    this.ref = getCellRef(rowIndex + 1, columnIndex + 1);
  }

  public applyTo(grid: SudokuGrid): void {
    grid.setValue(this.rowIndex, this.columnIndex, this.value);
  }

  public toString(): string {
    return `${this.ref}=${String(this.value)}`;
  }
}
