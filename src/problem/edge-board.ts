/**
 * Edge-Matching Board
 *
 * A fixed-size grid of cells, each empty or holding one oriented piece.
 * Boards are immutable: placing a piece returns a new board, so sibling
 * branches of a search never see each other's placements.
 */

import type { EdgeAlphabet } from "./edge-alphabet";
import { EAST, NORTH, SOUTH, WEST, type Piece } from "./edge-piece";

export interface CellPosition {
  row: number;
  col: number;
}

export interface Board {
  readonly rows: number;
  readonly cols: number;
  /** Row-major cells; null marks an empty cell */
  readonly cells: readonly (Piece | null)[];
}

/** How an empty cell is written in formatted boards */
export const EMPTY_CELL = "_";

export function createEmptyBoard(rows: number, cols: number): Board {
  if (!Number.isInteger(rows) || rows <= 0 || !Number.isInteger(cols) || cols <= 0) {
    throw new RangeError(`Board dimensions must be positive integers, got ${rows}x${cols}`);
  }
  return {
    rows,
    cols,
    cells: Array.from({ length: rows * cols }, () => null),
  };
}

/**
 * Build a board from rows of cells. Empty cells may be given as null
 * or as the "_" placeholder used by formatBoard.
 */
export function boardFromRows(grid: readonly (readonly (Piece | null)[])[]): Board {
  const rows = grid.length;
  const cols = grid[0]?.length ?? 0;
  const board = createEmptyBoard(rows, cols);
  const cells: (Piece | null)[] = [...board.cells];

  for (let row = 0; row < rows; row++) {
    if (grid[row].length !== cols) {
      throw new RangeError(`Row ${row} has ${grid[row].length} cells, expected ${cols}`);
    }
    for (let col = 0; col < cols; col++) {
      const cell = grid[row][col];
      cells[row * cols + col] = cell === null || cell === EMPTY_CELL ? null : cell;
    }
  }

  return { rows, cols, cells };
}

function isInside(board: Board, row: number, col: number): boolean {
  return row >= 0 && row < board.rows && col >= 0 && col < board.cols;
}

/** Piece at a position; null for empty cells and positions off the board */
export function getCell(board: Board, position: CellPosition): Piece | null {
  if (!isInside(board, position.row, position.col)) return null;
  return board.cells[position.row * board.cols + position.col];
}

export function isBoardFull(board: Board): boolean {
  return board.cells.every((cell) => cell !== null);
}

/**
 * First empty cell in row-major order, or null when the board is full.
 * The search always fills this cell next, so it only ever chooses which
 * piece to place, never where.
 */
export function findNextEmpty(board: Board): CellPosition | null {
  const index = board.cells.indexOf(null);
  if (index < 0) return null;
  return { row: Math.floor(index / board.cols), col: index % board.cols };
}

/**
 * Neighbour offsets per edge, with the edge of the neighbour that faces back.
 */
const NEIGHBORS = [
  { edge: NORTH, dr: -1, dc: 0, facing: SOUTH },
  { edge: EAST, dr: 0, dc: 1, facing: WEST },
  { edge: SOUTH, dr: 1, dc: 0, facing: NORTH },
  { edge: WEST, dr: 0, dc: -1, facing: EAST },
] as const;

/**
 * Whether a piece can go at a position: every placed neighbour must show
 * the complement of the edge it touches. The board boundary and empty
 * neighbours always match.
 */
export function pieceFits(
  board: Board,
  piece: Piece,
  position: CellPosition,
  alphabet: EdgeAlphabet
): boolean {
  for (const { edge, dr, dc, facing } of NEIGHBORS) {
    const neighbor = getCell(board, { row: position.row + dr, col: position.col + dc });
    if (neighbor === null) continue;
    if (neighbor[facing] !== alphabet.complement(piece[edge])) return false;
  }
  return true;
}

/** Copy of the board with one more piece placed */
export function placePiece(board: Board, piece: Piece, position: CellPosition): Board {
  const { row, col } = position;
  if (!isInside(board, row, col)) {
    throw new RangeError(`Cell (${row},${col}) is outside the ${board.rows}x${board.cols} board`);
  }
  const index = row * board.cols + col;
  if (board.cells[index] !== null) {
    throw new RangeError(`Cell (${row},${col}) already holds ${board.cells[index]}`);
  }

  const cells = [...board.cells];
  cells[index] = piece;
  return { rows: board.rows, cols: board.cols, cells };
}

/** Rows of cells, empty cells as null */
export function boardRows(board: Board): (Piece | null)[][] {
  return Array.from({ length: board.rows }, (_, row) =>
    board.cells.slice(row * board.cols, (row + 1) * board.cols)
  );
}

/**
 * One line per row, cells right-aligned to width 4:
 *
 *   FDGE GHFC BHCG FBGG
 *   HFAG    _    _    _
 */
export function formatBoard(board: Board): string {
  return boardRows(board)
    .map((row) => row.map((cell) => (cell ?? EMPTY_CELL).padStart(4)).join(" "))
    .join("\n");
}

/** Compact key for comparing boards in sets */
export function boardKey(board: Board): string {
  return boardRows(board)
    .map((row) => row.map((cell) => cell ?? EMPTY_CELL).join(","))
    .join("|");
}
