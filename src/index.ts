export type {
  Coordinate,
  Grid
} from './Board.ts';
export type { FormatBoardOptions } from './parsers.ts';
export type { PuzzleFile } from './puzzleFile.ts';
export type { SudokuErrorCode } from './SudokuError.ts';

export {
  BLANK,
  Board,
  CELL_COUNT,
  GRID_SIZE,
  NONET_SIZE
} from './Board.ts';
export {
  formatBoard,
  getCellRef,
  parseCellRef,
  parseGrid
} from './parsers.ts';
export { parsePuzzleFile } from './puzzleFile.ts';
export { Solver } from './Solver.ts';
export {
  isSudokuError,
  SudokuError
} from './SudokuError.ts';
