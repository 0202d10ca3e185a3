import type { Coordinate } from './Board.ts';

import {
  BLANK,
  Board,
  GRID_SIZE,
  NONET_SIZE
} from './Board.ts';
import { SudokuError } from './SudokuError.ts';
import { ensureNonNullable } from './typeGuards.ts';

export interface FormatBoardOptions {
  readonly blank?: '.' | '0';
}

const CHAR_CODE_A = 65;
const NONET_SEPARATOR = '|';
const NONET_ROW_SEPARATOR = '------+-------+------';
const SEPARATOR_LINE_PATTERN = /^[-+=\s]+$/;
const IGNORED_CHAR_PATTERN = /[\s|]/;

export function formatBoard(board: Board, options: FormatBoardOptions = {}): string {
  const blank = options.blank ?? '.';
  const lines: string[] = [];
  for (let row = 0; row < GRID_SIZE; row++) {
    if (row > 0 && row % NONET_SIZE === 0) {
      lines.push(NONET_ROW_SEPARATOR);
    }
    const groups: string[] = [];
    for (let start = 0; start < GRID_SIZE; start += NONET_SIZE) {
      const values = board.getRow(row).slice(start, start + NONET_SIZE);
      groups.push(values.map((value) => (value === BLANK ? blank : String(value))).join(' '));
    }
    lines.push(groups.join(` ${NONET_SEPARATOR} `));
  }
  return lines.join('\n');
}

export function getCellRef(coordinate: Coordinate): string {
  return String.fromCharCode(CHAR_CODE_A + coordinate.column) + String(coordinate.row + 1);
}

export function parseCellRef(token: string): Coordinate {
  const m = /^(?<col>[A-I])(?<row>[1-9])$/.exec(token.trim().toUpperCase());
  if (!m) {
    throw new SudokuError('InvalidIndex', `Bad cell ref: ${token}`);
  }
  const groups = ensureNonNullable(m.groups);
  return {
    column: ensureNonNullable(groups['col']).charCodeAt(0) - CHAR_CODE_A,
    row: parseInt(ensureNonNullable(groups['row']), 10) - 1
  };
}

/**
 * Reads one board row per non-blank line. `0` and `.` are blanks; spaces and
 * `|` are ignored, and lines made only of `-`, `+` or `=` are skipped, so the
 * output of {@link formatBoard} parses back.
 */
export function parseGrid(text: string): Board {
  const rows: number[][] = [];
  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '' || SEPARATOR_LINE_PATTERN.test(line)) {
      continue;
    }
    const row: number[] = [];
    for (const ch of line) {
      if (IGNORED_CHAR_PATTERN.test(ch)) {
        continue;
      }
      if (ch === '.') {
        row.push(BLANK);
      } else if (/^\d$/.test(ch)) {
        row.push(parseInt(ch, 10));
      } else {
        throw new SudokuError('InvalidValue', `Unexpected character '${ch}' in grid row ${String(rows.length + 1)}: ${line.trim()}`);
      }
    }
    rows.push(row);
  }
  return new Board(rows);
}
