import { parse } from 'csv-parse/sync';
import { load } from 'js-yaml';

import {
  getCellRef,
  parseCellRef
} from './cellRefs.ts';
import {
  EMPTY_CELL,
  GRID_SIZE
} from './constants.ts';
import { SudokuGrid } from './SudokuGrid.ts';
import {
  isDigit,
  isRecord,
  isStringArray
} from './typeGuards.ts';

export type { CellRef } from './cellRefs.ts';
export {
  getCellRef,
  parseCellRef
} from './cellRefs.ts';

export interface PuzzleDefinition {
  readonly grid: SudokuGrid;
  readonly title?: string;
}

const DECIMAL_RADIX = 10;
const CELL_RANGE_HINT = 'Expected a number from 0-9 (0 for empty, 1-9 for filled cells).';

/**
 * Parses a puzzle written as 9 records of 9 comma-separated cells (RFC 4180, so `"5"` is a cell
 * holding 5).
 *
 * Cells are trimmed; an empty cell or `0` is an empty square. Blank lines are skipped.
 * Row and column numbers in error messages are 0-based.
 */
export function parseCsvGrid(text: string): SudokuGrid {
  const records: unknown = parse(text, {
    relaxColumnCount: true,
    skipEmptyLines: true
  });
  if (!Array.isArray(records)) {
    throw new Error('CSV reader did not return a list of records');
  }

  const rows: number[][] = [];
  for (const [rowIndex, record] of records.entries()) {
    if (rowIndex >= GRID_SIZE) {
      throw new Error(`CSV has more than ${String(GRID_SIZE)} rows. Found a row at index ${String(rowIndex)}`);
    }
    if (!isStringArray(record)) {
      throw new Error(`Row ${String(rowIndex)} is not a list of cells`);
    }
    if (record.length !== GRID_SIZE) {
      throw new Error(
        `Row ${String(rowIndex)} has ${String(record.length)} columns, expected ${String(GRID_SIZE)}. Found: ${
          record.join(',')
        }`
      );
    }
    rows.push(record.map((cell, columnIndex) => parseCsvCell(cell, rowIndex, columnIndex)));
  }

  if (rows.length !== GRID_SIZE) {
    throw new Error(`CSV has ${String(rows.length)} rows, expected ${String(GRID_SIZE)}`);
  }
  return new SudokuGrid(rows);
}

/**
 * Parses a YAML puzzle file.
 *
 * Either `rows` (9 strings such as `53..7....`, or 9 lists of numbers) or `givens`
 * (a mapping of cell refs such as `A1` to digits) describes the grid; `title` is optional.
 */
export function parseYamlPuzzle(text: string): PuzzleDefinition {
  const parsed = load(text);
  if (!isRecord(parsed)) {
    throw new Error('YAML puzzle must be a mapping');
  }

  const { givens, rows, title } = parsed;
  if (title !== undefined && typeof title !== 'string') {
    throw new Error('title must be a string');
  }
  if ((rows === undefined) === (givens === undefined)) {
    throw new Error('YAML puzzle must have exactly one of \'rows\' or \'givens\'');
  }

  const grid = rows === undefined ? parseGivens(givens) : new SudokuGrid(parseYamlRows(rows));
  const trimmedTitle = title?.trim();
  return trimmedTitle ? { grid, title: trimmedTitle } : { grid };
}

function parseCsvCell(cell: string, rowIndex: number, columnIndex: number): number {
  const text = cell.trim();
  if (text === '' || text === '0') {
    return EMPTY_CELL;
  }
  if (!/^[+-]?\d+$/.test(text)) {
    throw new Error(`Invalid value at row ${String(rowIndex)}, column ${String(columnIndex)}: '${text}'. ${CELL_RANGE_HINT}`);
  }
  const value = parseInt(text, DECIMAL_RADIX);
  if (value < 0 || value > GRID_SIZE) {
    throw new Error(
      `Value out of range at row ${String(rowIndex)}, column ${String(columnIndex)}: '${text}'. ${CELL_RANGE_HINT}`
    );
  }
  return value;
}

function parseGivens(givens: unknown): SudokuGrid {
  if (!isRecord(givens)) {
    throw new Error('givens must be a mapping of cell refs to digits');
  }
  const grid = SudokuGrid.empty();
  const seen = new Set<string>();
  for (const [ref, value] of Object.entries(givens)) {
    if (!isDigit(value)) {
      throw new Error(`givens.${ref} must be a digit 1-9, got ${String(value)}`);
    }
    const { columnId, rowId } = parseCellRef(ref);
    const cellRef = getCellRef(rowId, columnId);
    if (seen.has(cellRef)) {
      throw new Error(`givens name cell ${cellRef} more than once`);
    }
    seen.add(cellRef);
    grid.setValue(rowId - 1, columnId - 1, value);
  }
  return grid;
}

function parseYamlRow(row: unknown, rowIndex: number): unknown[] {
  if (Array.isArray(row)) {
    return row;
  }
  if (typeof row !== 'string') {
    throw new Error(`rows[${String(rowIndex)}] must be a quoted string of digits or a list of numbers`);
  }
  return Array.from(row.replace(/\s+/g, ''), (ch, columnIndex) => {
    if (ch === '.' || ch === '0') {
      return EMPTY_CELL;
    }
    if (!/^[1-9]$/.test(ch)) {
      throw new Error(`Invalid character at row ${String(rowIndex)}, column ${String(columnIndex)}: '${ch}'`);
    }
    return parseInt(ch, DECIMAL_RADIX);
  });
}

function parseYamlRows(rows: unknown): unknown[][] {
  if (!Array.isArray(rows)) {
    throw new Error('rows must be a list');
  }
  return rows.map((row: unknown, rowIndex) => parseYamlRow(row, rowIndex));
}
