import { readFileSync } from 'node:fs';
import {
  dirname,
  resolve
} from 'node:path';
import { fileURLToPath } from 'node:url';

import type { PuzzleFile } from '../src/puzzleFile.ts';

import { parsePuzzleFile } from '../src/puzzleFile.ts';
import { SudokuError } from '../src/SudokuError.ts';
import { ensureNonNullable } from '../src/typeGuards.ts';

export type FixtureName = 'easy' | 'hard' | 'medium';

const PUZZLES_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '..', 'puzzles');

export function loadFixture(name: FixtureName): PuzzleFile {
  return parsePuzzleFile(readFileSync(resolve(PUZZLES_DIR, `${name}.yaml`), 'utf-8'), name);
}

export function loadFixtureSolution(name: FixtureName): number[][] {
  return ensureNonNullable(loadFixture(name).solution).toGrid();
}

export function withCell(grid: readonly (readonly number[])[], row: number, column: number, value: number): number[][] {
  const copy = grid.map((values) => [...values]);
  ensureNonNullable(copy[row])[column] = value;
  return copy;
}

export function captureSudokuError(fn: () => unknown): SudokuError {
  try {
    fn();
  } catch (error: unknown) {
    if (error instanceof SudokuError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a SudokuError to be thrown');
}
