import { SudokuError } from './SudokuError.ts';
import {
  ensureNonNullable,
  isIntegerInRange
} from './typeGuards.ts';

export interface Coordinate {
  readonly column: number;
  readonly row: number;
}

export type Grid = readonly (readonly number[])[];

export const GRID_SIZE = 9;
export const NONET_SIZE = 3;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;
export const BLANK = 0;

const MAX_INDEX = GRID_SIZE - 1;

/**
 * A 9x9 Sudoku grid holding 0 for blanks and 1-9 for placed values.
 *
 * Dimensions and value ranges are checked once, at construction. Rule
 * violations (repeated values) are not: use {@link Board.allSpacesValid}.
 */
export class Board {
  private readonly configuration: number[][];

  public constructor(cells: Grid) {
    if (cells.length !== GRID_SIZE) {
      throw new SudokuError('InvalidDimensions', `Board must have ${String(GRID_SIZE)} rows, got ${String(cells.length)}`);
    }

    const configuration: number[][] = [];
    for (const [rowIndex, row] of cells.entries()) {
      if (row.length !== GRID_SIZE) {
        throw new SudokuError(
          'InvalidDimensions',
          `Row ${String(rowIndex)} must have ${String(GRID_SIZE)} columns, got ${String(row.length)}`
        );
      }
      for (const [columnIndex, value] of row.entries()) {
        assertCellValue(value, rowIndex, columnIndex);
      }
      configuration.push([...row]);
    }
    this.configuration = configuration;
  }

  public static fromFlat(values: readonly number[]): Board {
    if (values.length !== CELL_COUNT) {
      throw new SudokuError('InvalidDimensions', `Flat board must have ${String(CELL_COUNT)} values, got ${String(values.length)}`);
    }
    return new Board(Array.from({ length: GRID_SIZE }, (_, row) => values.slice(row * GRID_SIZE, (row + 1) * GRID_SIZE)));
  }

  public static getNonetIndex(row: number, column: number): number {
    assertIndex(row, 'row');
    assertIndex(column, 'column');
    return NONET_SIZE * Math.floor(row / NONET_SIZE) + Math.floor(column / NONET_SIZE);
  }

  public allSpacesSolved(): boolean {
    return this.configuration.every((row) => !row.includes(BLANK));
  }

  /**
   * True when no row, column or nonet repeats a non-zero value.
   * Blanks are ignored, so a valid board may still have no solution.
   */
  public allSpacesValid(): boolean {
    for (let index = 0; index < GRID_SIZE; index++) {
      if (hasDuplicateValue(this.getRow(index)) || hasDuplicateValue(this.getColumn(index)) || hasDuplicateValue(this.getNonet(index))) {
        return false;
      }
    }
    return true;
  }

  public clone(): Board {
    return new Board(this.configuration);
  }

  public equals(other: Board): boolean {
    return this.configuration.every((row, rowIndex) => row.every((value, columnIndex) => value === other.getCell(rowIndex, columnIndex)));
  }

  public getCell(row: number, column: number): number {
    assertIndex(row, 'row');
    assertIndex(column, 'column');
    return ensureNonNullable(ensureNonNullable(this.configuration[row])[column]);
  }

  public getColumn(column: number): number[] {
    assertIndex(column, 'column');
    return this.configuration.map((row) => ensureNonNullable(row[column]));
  }

  public getFilledCount(): number {
    return CELL_COUNT - this.getUnsolvedSpaces().length;
  }

  /**
   * Nonets are numbered 0-8 left to right, top to bottom. Values come back
   * in row-major order within the nonet.
   */
  public getNonet(nonet: number): number[] {
    assertIndex(nonet, 'nonet');
    const startRow = NONET_SIZE * Math.floor(nonet / NONET_SIZE);
    const startColumn = NONET_SIZE * (nonet % NONET_SIZE);
    const values: number[] = [];
    for (let row = startRow; row < startRow + NONET_SIZE; row++) {
      const rowValues = ensureNonNullable(this.configuration[row]);
      values.push(...rowValues.slice(startColumn, startColumn + NONET_SIZE));
    }
    return values;
  }

  public getRow(row: number): number[] {
    assertIndex(row, 'row');
    return [...ensureNonNullable(this.configuration[row])];
  }

  /**
   * Blank cells in row-major scan order. The solver searches in exactly
   * this order.
   */
  public getUnsolvedSpaces(): Coordinate[] {
    const spaces: Coordinate[] = [];
    for (const [row, values] of this.configuration.entries()) {
      for (const [column, value] of values.entries()) {
        if (value === BLANK) {
          spaces.push({ column, row });
        }
      }
    }
    return spaces;
  }

  public setCell(row: number, column: number, value: number): void {
    assertIndex(row, 'row');
    assertIndex(column, 'column');
    assertCellValue(value, row, column);
    ensureNonNullable(this.configuration[row])[column] = value;
  }

  public toGrid(): number[][] {
    return this.configuration.map((row) => [...row]);
  }

  public toString(): string {
    return this.configuration.map((row) => row.join('')).join('\n');
  }
}

function assertCellValue(value: number, row: number, column: number): void {
  if (!isIntegerInRange(value, BLANK, GRID_SIZE)) {
    throw new SudokuError(
      'InvalidValue',
      `Cell (${String(row)}, ${String(column)}) must hold an integer from ${String(BLANK)} to ${String(GRID_SIZE)}, got ${String(value)}`
    );
  }
}

function assertIndex(index: number, kind: 'column' | 'nonet' | 'row'): void {
  if (!isIntegerInRange(index, 0, MAX_INDEX)) {
    throw new SudokuError('InvalidIndex', `Invalid ${kind} index ${String(index)}, expected 0-${String(MAX_INDEX)}`);
  }
}

function hasDuplicateValue(values: readonly number[]): boolean {
  const filled = values.filter((value) => value !== BLANK);
  return new Set(filled).size !== filled.length;
}
