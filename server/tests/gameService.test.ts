import { describe, expect, it } from 'vitest';
import { boardToString, cellIndex, createBoard, hasLine, isBoardFull } from '../src/services/gameService';
import type { Cell } from '../src/types/game';

function board(text: string): Cell[] {
  return createBoard().map((_, i) => {
    const c = text[i];
    return c === '1' || c === '2' ? c : '0';
  });
}

describe('gameService', () => {
  it('creates an empty nine-cell board', () => {
    expect(boardToString(createBoard())).toBe('000000000');
  });

  it('indexes cells row-major', () => {
    expect(cellIndex(0, 0)).toBe(0);
    expect(cellIndex(2, 0)).toBe(2);
    expect(cellIndex(0, 1)).toBe(3);
    expect(cellIndex(1, 2)).toBe(7);
  });

  it('detects rows, columns and diagonals', () => {
    expect(hasLine(board('111000000'), '1')).toBe(true);
    expect(hasLine(board('200200200'), '2')).toBe(true);
    expect(hasLine(board('001010100'), '1')).toBe(true);
    expect(hasLine(board('100010001'), '1')).toBe(true);
    expect(hasLine(board('110000000'), '1')).toBe(false);
    expect(hasLine(board('111000000'), '2')).toBe(false);
  });

  it('reports a full board without a line as no winner', () => {
    const drawn = board('121121212');
    expect(isBoardFull(drawn)).toBe(true);
    expect(hasLine(drawn, '1')).toBe(false);
    expect(hasLine(drawn, '2')).toBe(false);
    expect(isBoardFull(board('121121210'))).toBe(false);
  });
});
