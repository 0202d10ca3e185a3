export type SudokuErrorCode =
  | 'InvalidDimensions'
  | 'InvalidIndex'
  | 'InvalidPuzzle'
  | 'InvalidValue'
  | 'Unsolvable';

/**
 * Raised for every rule a grid or a solver call can break.
 *
 * `InvalidIndex` marks a caller bug; the other codes describe bad input.
 */
export class SudokuError extends Error {
  public override readonly name = 'SudokuError';

  public constructor(public readonly code: SudokuErrorCode, message: string) {
    super(message);
  }
}

export function isSudokuError(value: unknown, code?: SudokuErrorCode): value is SudokuError {
  return value instanceof SudokuError && (code === undefined || value.code === code);
}
