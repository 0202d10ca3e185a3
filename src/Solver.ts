import type {
  Coordinate,
  Grid
} from './Board.ts';

import {
  BLANK,
  Board,
  CELL_COUNT,
  GRID_SIZE
} from './Board.ts';
import { SudokuError } from './SudokuError.ts';
import { ensureNonNullable } from './typeGuards.ts';

const CANDIDATE_VALUES = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const;
const PERCENT = 100;

export class Solver {
  /** A copy of the starting board. */
  public get board(): Board {
    return this.base.clone();
  }

  public get isSolved(): boolean {
    return this.cachedResult !== null;
  }

  public readonly percentSolved: number;
  public readonly unsolvedSpaces: readonly Coordinate[];

  private readonly base: Board;
  private cachedResult: Board | null = null;

  public constructor(board: Board) {
    if (!board.allSpacesValid()) {
      throw new SudokuError('InvalidPuzzle', 'Starting board repeats a value in a row, column or nonet');
    }
    this.base = board.clone();
    this.unsolvedSpaces = this.base.getUnsolvedSpaces();
    this.percentSolved = (1 - this.unsolvedSpaces.length / CELL_COUNT) * PERCENT;
  }

  public static fromGrid(cells: Grid): Solver {
    return new Solver(new Board(cells));
  }

  /**
   * Fills every blank by chronological backtracking over
   * {@link unsolvedSpaces} in their fixed order. The first result is cached;
   * later calls return a copy of it without searching again.
   */
  public solve(): Board {
    if (this.cachedResult) {
      return this.cachedResult.clone();
    }

    const working = this.base.clone();
    const attemptedValues = new Map<number, number[]>();
    let cursor = 0;

    while (cursor < this.unsolvedSpaces.length) {
      const { column, row } = ensureNonNullable(this.unsolvedSpaces[cursor]);
      const key = row * GRID_SIZE + column;

      // Undo whatever an earlier pass placed here before backtracking.
      working.setCell(row, column, BLANK);

      const attempted = attemptedValues.get(key) ?? [];
      const forbidden = new Set<number>(attempted);
      for (const value of [
        ...working.getRow(row),
        ...working.getColumn(column),
        ...working.getNonet(Board.getNonetIndex(row, column))
      ]) {
        if (value !== BLANK) {
          forbidden.add(value);
        }
      }

      const candidate = CANDIDATE_VALUES.find((value) => !forbidden.has(value));
      if (candidate === undefined) {
        attemptedValues.delete(key);
        cursor--;
        if (cursor < 0) {
          throw new SudokuError('Unsolvable', 'Board satisfies the rules so far but has no complete solution');
        }
        continue;
      }

      working.setCell(row, column, candidate);
      attempted.push(candidate);
      attemptedValues.set(key, attempted);
      cursor++;
    }

    this.cachedResult = working;
    return working.clone();
  }
}
