/**
 * Solve a Sudoku puzzle described by a YAML file and report timings.
 *
 * Usage:
 *     npm run solve -- puzzles/hard.yaml [A1 E5 ...]
 *
 * The YAML file needs a `grid` block; `title`, `difficulty` and `solution`
 * are optional. When `solution` is present the result is checked against it.
 * Cell refs after the file name print the solved value of those cells.
 */

/* eslint-disable no-console -- CLI script output. */

import {
  existsSync,
  readFileSync
} from 'node:fs';
import { basename } from 'node:path';
import { performance } from 'node:perf_hooks';

import type { Board } from '../src/Board.ts';

import {
  formatBoard,
  getCellRef,
  parseCellRef
} from '../src/parsers.ts';
import { parsePuzzleFile } from '../src/puzzleFile.ts';
import { Solver } from '../src/Solver.ts';
import { isSudokuError } from '../src/SudokuError.ts';

const FIRST_CLI_ARG_INDEX = 2;
const PERCENT_DIGITS = 2;
const TIMING_DIGITS = 3;

interface TimedResult {
  readonly board: Board;
  readonly elapsedMs: number;
}

function main(): void {
  const specPath = process.argv[FIRST_CLI_ARG_INDEX];
  if (specPath === undefined) {
    console.error('Usage: npm run solve -- <puzzle.yaml> [cell refs...]');
    process.exit(1);
  }
  if (!existsSync(specPath)) {
    console.error(`Error: ${specPath} not found`);
    process.exit(1);
  }

  try {
    solvePuzzleFile(specPath, process.argv.slice(FIRST_CLI_ARG_INDEX + 1));
  } catch (error: unknown) {
    if (isSudokuError(error)) {
      console.error(`Error (${error.code}): ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

function solvePuzzleFile(specPath: string, cellRefs: readonly string[]): void {
  const requestedCells = cellRefs.map((ref) => parseCellRef(ref));
  const puzzle = parsePuzzleFile(readFileSync(specPath, 'utf-8'), basename(specPath, '.yaml'));
  const solver = new Solver(puzzle.board);

  console.log(puzzle.difficulty === undefined ? puzzle.title : `${puzzle.title} (${puzzle.difficulty})`);
  console.log(`Clues: ${String(puzzle.board.getFilledCount())}, ${solver.percentSolved.toFixed(PERCENT_DIGITS)}% solved`);
  const firstSpace = solver.unsolvedSpaces[0];
  if (firstSpace !== undefined) {
    console.log(`Search starts at ${getCellRef(firstSpace)} over ${String(solver.unsolvedSpaces.length)} blanks`);
  }
  console.log(formatBoard(puzzle.board));
  console.log();

  const first = timeSolve(solver);
  const cached = timeSolve(solver);
  console.log(formatBoard(first.board));
  console.log();
  console.log(`First solve: ${first.elapsedMs.toFixed(TIMING_DIGITS)} ms`);
  console.log(`Cached solve: ${cached.elapsedMs.toFixed(TIMING_DIGITS)} ms`);
  for (const cell of requestedCells) {
    console.log(`${getCellRef(cell)} = ${String(first.board.getCell(cell.row, cell.column))}`);
  }

  if (puzzle.solution !== undefined) {
    if (!first.board.equals(puzzle.solution)) {
      console.error('Result does not match the expected solution');
      process.exit(1);
    }
    console.log('Result matches the expected solution');
  }
}

function timeSolve(solver: Solver): TimedResult {
  const start = performance.now();
  const board = solver.solve();
  return { board, elapsedMs: performance.now() - start };
}

main();

/* eslint-enable no-console -- End CLI script output. */
