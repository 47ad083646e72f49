import {
  BOX_SIZE,
  EMPTY_CELL,
  GRID_SIZE
} from './constants.ts';
import {
  ensureNonNullable,
  isCellValue
} from './typeGuards.ts';

export type CellValue = 0 | Digit;

/* eslint-disable no-magic-numbers -- The digit alphabet is literal. */
export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
/* eslint-enable no-magic-numbers -- End digit alphabet. */

export type HouseType = 'box' | 'column' | 'row';

export const HOUSE_TYPES: readonly HouseType[] = ['row', 'column', 'box'];

/**
 * A 9x9 Sudoku board, row-major, `0` for an empty cell.
 *
 * The grid is mutated in place by the deduction loop. Whoever constructs it owns it;
 * nothing in the engine keeps a copy.
 */
export class SudokuGrid {
  public get emptyCellCount(): number {
    let count = 0;
    for (const row of this.cells) {
      for (const value of row) {
        if (value === EMPTY_CELL) {
          count++;
        }
      }
    }
    return count;
  }

  public get isFull(): boolean {
    return this.emptyCellCount === 0;
  }

  private readonly cells: CellValue[][];

  /**
   * @param rows - Exactly 9 rows of 9 integers in [0, 9].
   * @throws If the shape or any cell value is out of range.
   */
  public constructor(rows: readonly (readonly unknown[])[]) {
    if (rows.length !== GRID_SIZE) {
      throw new Error(`Grid has ${String(rows.length)} rows, expected ${String(GRID_SIZE)}`);
    }
    this.cells = rows.map((row, rowIndex) => {
      if (row.length !== GRID_SIZE) {
        throw new Error(`Row ${String(rowIndex)} has ${String(row.length)} columns, expected ${String(GRID_SIZE)}`);
      }
      return row.map((value, columnIndex) => {
        if (!isCellValue(value)) {
          throw new Error(
            `Invalid value at row ${String(rowIndex)}, column ${String(columnIndex)}: ${String(value)}. `
              + 'Expected an integer from 0 to 9 (0 for empty, 1-9 for filled cells).'
          );
        }
        return value;
      });
    });
  }

  public static empty(): SudokuGrid {
    return new SudokuGrid(Array.from({ length: GRID_SIZE }, () => Array.from({ length: GRID_SIZE }, () => EMPTY_CELL)));
  }

  /**
   * Box `index` is box (i, j) with `index = 3i + j`; it covers rows 3i..3i+2 and columns 3j..3j+2.
   */
  public getBox(index: number): CellValue[] {
    assertHouseIndex(index);
    const firstRow = Math.floor(index / BOX_SIZE) * BOX_SIZE;
    const firstColumn = (index % BOX_SIZE) * BOX_SIZE;
    const values: CellValue[] = [];
    for (let rowOffset = 0; rowOffset < BOX_SIZE; rowOffset++) {
      for (let columnOffset = 0; columnOffset < BOX_SIZE; columnOffset++) {
        values.push(this.getValue(firstRow + rowOffset, firstColumn + columnOffset));
      }
    }
    return values;
  }

  public getColumn(index: number): CellValue[] {
    assertHouseIndex(index);
    return this.cells.map((row) => ensureNonNullable(row[index]));
  }

  public getHouse(type: HouseType, index: number): CellValue[] {
    switch (type) {
      case 'box':
        return this.getBox(index);
      case 'column':
        return this.getColumn(index);
      case 'row':
        return this.getRow(index);
      default: {
        const exhaustive: never = type;
        throw new Error(`Unknown house type: ${String(exhaustive)}`);
      }
    }
  }

  public getRow(index: number): CellValue[] {
    return [...this.rowAt(index)];
  }

  public getValue(rowIndex: number, columnIndex: number): CellValue {
    assertHouseIndex(columnIndex);
    return ensureNonNullable(this.rowAt(rowIndex)[columnIndex]);
  }

  public setValue(rowIndex: number, columnIndex: number, value: CellValue): void {
    assertHouseIndex(columnIndex);
    this.rowAt(rowIndex)[columnIndex] = value;
  }

  /**
   * Snapshot of the current board; later mutations of the grid do not affect it.
   */
  public toRows(): CellValue[][] {
    return this.cells.map((row) => [...row]);
  }

  private rowAt(index: number): CellValue[] {
    assertHouseIndex(index);
    return ensureNonNullable(this.cells[index]);
  }
}

function assertHouseIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= GRID_SIZE) {
    throw new Error(`Index out of range: ${String(index)}`);
  }
}
