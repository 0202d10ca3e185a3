import {
  describe,
  expect,
  it
} from 'vitest';

import {
  isSudokuError,
  SudokuError
} from '../src/SudokuError.ts';

describe('SudokuError', () => {
  it('carries a code and a message', () => {
    const error = new SudokuError('Unsolvable', 'no solution');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SudokuError');
    expect(error.code).toBe('Unsolvable');
    expect(error.message).toBe('no solution');
  });
});

describe('isSudokuError', () => {
  it('matches any code by default', () => {
    expect(isSudokuError(new SudokuError('InvalidValue', 'bad'))).toBe(true);
  });

  it('filters by code', () => {
    const error = new SudokuError('InvalidIndex', 'bad');
    expect(isSudokuError(error, 'InvalidIndex')).toBe(true);
    expect(isSudokuError(error, 'InvalidPuzzle')).toBe(false);
  });

  it('rejects other errors', () => {
    expect(isSudokuError(new Error('bad'))).toBe(false);
    expect(isSudokuError('bad')).toBe(false);
  });
});
