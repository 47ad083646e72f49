import { fileURLToPath } from 'node:url';
import {
  describe,
  expect,
  it
} from 'vitest';

import { loadPuzzleFile } from '../src/puzzleFile.ts';
import { isValidSudoku } from '../src/validation.ts';
import { TWO_PASS_ROWS } from './gridTestHelper.ts';

function fixturePath(name: string): string {
  return fileURLToPath(new URL(`fixtures/${name}`, import.meta.url));
}

describe('loadPuzzleFile', () => {
  it('loads a CSV puzzle titled after the file', () => {
    const puzzle = loadPuzzleFile(fixturePath('twoPasses.csv'));
    expect(puzzle.title).toBe('twoPasses');
    expect(puzzle.grid.toRows()).toEqual(TWO_PASS_ROWS);
  });

  it('loads a YAML puzzle', () => {
    const puzzle = loadPuzzleFile(fixturePath('twoPasses.yaml'));
    expect(puzzle.title).toBe('TWO PASSES');
    expect(puzzle.grid.toRows()).toEqual(TWO_PASS_ROWS);
  });

  it('loads a well-formed grid even when it breaks the rules', () => {
    const puzzle = loadPuzzleFile(fixturePath('invalid.csv'));
    expect(puzzle.grid.getRow(0)).toEqual([5, 3, 0, 0, 7, 0, 0, 0, 5]);
    expect(isValidSudoku(puzzle.grid)).toBe(false);
  });

  it('passes parse errors through', () => {
    expect(() => loadPuzzleFile(fixturePath('short.yaml'))).toThrow('rows[0] must be a quoted string');
  });

  it('rejects other file types', () => {
    expect(() => loadPuzzleFile(fixturePath('puzzle.json'))).toThrow(
      'Unsupported puzzle file type \'.json\': expected .csv, .yaml or .yml'
    );
  });
});
