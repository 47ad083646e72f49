import type { PuzzleDefinition } from './parsers.ts';

import { readFileSync } from 'node:fs';
import {
  basename,
  extname
} from 'node:path';

import {
  parseCsvGrid,
  parseYamlPuzzle
} from './parsers.ts';

export const DEFAULT_PUZZLE_FILE = 'sudoku.csv';

/**
 * Reads a `.csv`, `.yaml` or `.yml` puzzle. A CSV puzzle is titled after its file name.
 */
export function loadPuzzleFile(path: string): PuzzleDefinition {
  const extension = extname(path).toLowerCase();
  const content = readFileSync(path, 'utf-8');
  switch (extension) {
    case '.csv':
      return { grid: parseCsvGrid(content), title: basename(path, extname(path)) };
    case '.yaml':
    case '.yml':
      return parseYamlPuzzle(content);
    default:
      throw new Error(`Unsupported puzzle file type '${extension}': expected .csv, .yaml or .yml`);
  }
}
