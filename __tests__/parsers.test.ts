import {
  describe,
  expect,
  it
} from 'vitest';

import {
  formatBoard,
  getCellRef,
  parseCellRef,
  parseGrid
} from '../src/parsers.ts';
import {
  captureSudokuError,
  loadFixture
} from './sudokuTestHelper.ts';

const COMPACT_EASY = [
  '073894512',
  '912735486',
  '845002973',
  '798261354',
  '526473891',
  '134589267',
  '469028735',
  '287356149',
  '351947620'
].join('\n');

describe('getCellRef', () => {
  it('converts row 0 column 0 to A1', () => {
    expect(getCellRef({ column: 0, row: 0 })).toBe('A1');
  });

  it('converts row 2 column 4 to E3', () => {
    expect(getCellRef({ column: 4, row: 2 })).toBe('E3');
  });

  it('converts row 8 column 8 to I9', () => {
    expect(getCellRef({ column: 8, row: 8 })).toBe('I9');
  });
});

describe('parseCellRef', () => {
  it('parses A1', () => {
    expect(parseCellRef('A1')).toEqual({ column: 0, row: 0 });
  });

  it('is case-insensitive', () => {
    expect(parseCellRef('e3')).toEqual({ column: 4, row: 2 });
  });

  it('throws for columns past I', () => {
    const error = captureSudokuError(() => parseCellRef('J1'));
    expect(error.code).toBe('InvalidIndex');
    expect(error.message).toBe('Bad cell ref: J1');
  });

  it('throws for row 0', () => {
    expect(() => parseCellRef('A0')).toThrow('Bad cell ref');
  });
});

describe('parseGrid', () => {
  it('reads compact rows with 0 for blanks', () => {
    expect(parseGrid(COMPACT_EASY).equals(loadFixture('easy').board)).toBe(true);
  });

  it('reads dots, spaces and separator lines', () => {
    const board = parseGrid(formatBoard(loadFixture('hard').board));
    expect(board.equals(loadFixture('hard').board)).toBe(true);
  });

  it('skips blank lines', () => {
    expect(parseGrid(`\n${COMPACT_EASY}\n\n`).getRow(8)).toEqual([3, 5, 1, 9, 4, 7, 6, 2, 0]);
  });

  it('throws for unexpected characters', () => {
    const error = captureSudokuError(() => parseGrid(COMPACT_EASY.replace('073894512', '07389451x')));
    expect(error.code).toBe('InvalidValue');
    expect(error.message).toBe('Unexpected character \'x\' in grid row 1: 07389451x');
  });

  it('throws for a missing row', () => {
    const error = captureSudokuError(() => parseGrid(COMPACT_EASY.split('\n').slice(1).join('\n')));
    expect(error.code).toBe('InvalidDimensions');
    expect(error.message).toBe('Board must have 9 rows, got 8');
  });

  it('throws for a short row', () => {
    const error = captureSudokuError(() => parseGrid(COMPACT_EASY.replace('912735486', '91273548')));
    expect(error.code).toBe('InvalidDimensions');
    expect(error.message).toBe('Row 1 must have 9 columns, got 8');
  });
});

describe('formatBoard', () => {
  it('separates nonets and renders blanks as dots', () => {
    expect(formatBoard(loadFixture('easy').board).split('\n')).toEqual([
      '. 7 3 | 8 9 4 | 5 1 2',
      '9 1 2 | 7 3 5 | 4 8 6',
      '8 4 5 | . . 2 | 9 7 3',
      '------+-------+------',
      '7 9 8 | 2 6 1 | 3 5 4',
      '5 2 6 | 4 7 3 | 8 9 1',
      '1 3 4 | 5 8 9 | 2 6 7',
      '------+-------+------',
      '4 6 9 | . 2 8 | 7 3 5',
      '2 8 7 | 3 5 6 | 1 4 9',
      '3 5 1 | 9 4 7 | 6 2 .'
    ]);
  });

  it('renders blanks as zeros on request', () => {
    const [firstLine] = formatBoard(loadFixture('easy').board, { blank: '0' }).split('\n');
    expect(firstLine).toBe('0 7 3 | 8 9 4 | 5 1 2');
  });
});
