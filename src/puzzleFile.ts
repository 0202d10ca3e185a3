import yaml from 'js-yaml';

import type { Board } from './Board.ts';

import { parseGrid } from './parsers.ts';
import { SudokuError } from './SudokuError.ts';
import { isStringRecord } from './typeGuards.ts';

export interface PuzzleFile {
  readonly board: Board;
  readonly difficulty?: string;
  readonly solution?: Board;
  readonly title: string;
}

/**
 * Parses a YAML puzzle description: `grid` (required) and `solution` use the
 * {@link parseGrid} text format; `title` defaults to `name`.
 */
export function parsePuzzleFile(content: string, name: string): PuzzleFile {
  const spec: unknown = yaml.load(content);
  if (!isStringRecord(spec)) {
    throw new Error('Puzzle file must be a YAML mapping');
  }

  const grid = spec['grid'];
  if (typeof grid !== 'string') {
    throw new Error('grid is required in puzzle file and must be a text block');
  }
  const board = parseGrid(grid);

  const title = readOptionalString(spec, 'title')?.trim() ?? '';
  const difficulty = readOptionalString(spec, 'difficulty')?.trim();

  let solution: Board | undefined;
  const solutionText = readOptionalString(spec, 'solution');
  if (solutionText !== undefined) {
    solution = parseGrid(solutionText);
    if (!solution.allSpacesSolved() || !solution.allSpacesValid()) {
      throw new SudokuError('InvalidPuzzle', 'solution must be a complete board that follows the rules');
    }
  }

  return {
    board,
    title: title === '' ? name : title,
    ...(difficulty !== undefined && { difficulty }),
    ...(solution !== undefined && { solution })
  };
}

function readOptionalString(spec: Record<string, unknown>, key: string): string | undefined {
  const value = spec[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${key} must be a string in puzzle file`);
  }
  return value;
}
