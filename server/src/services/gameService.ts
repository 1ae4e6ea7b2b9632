import type { Cell, Marker } from '../types/game';

export const BOARD_SIZE = 3;
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

export function createBoard(): Cell[] {
  return Array<Cell>(CELL_COUNT).fill('0');
}

const WIN_LINES = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

export function cellIndex(column: number, row: number): number {
  return row * BOARD_SIZE + column;
}

export function hasLine(board: readonly Cell[], marker: Marker): boolean {
  return WIN_LINES.some((line) => line.every((i) => board[i] === marker));
}

export function isBoardFull(board: readonly Cell[]): boolean {
  return board.every((c) => c !== '0');
}

export function boardToString(board: readonly Cell[]): string {
  return board.join('');
}
