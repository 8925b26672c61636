/**
 * Edge-matching piece transforms.
 *
 * A piece is a 4-character string listing its edge symbols clockwise from
 * the top: north, east, south, west. Each physical piece can be laid in
 * 8 orientations (4 rotations on each of its 2 sides).
 */

import type { EdgeAlphabet } from "./edge-alphabet";

/** Edge symbols in north, east, south, west order, e.g. "EAGB" */
export type Piece = string;

/** Index of each edge within a piece string */
export const NORTH = 0;
export const EAST = 1;
export const SOUTH = 2;
export const WEST = 3;

export class InvalidPieceError extends Error {
  readonly piece: string;
  readonly index: number | undefined;

  constructor(piece: string, reason: string, index?: number) {
    const where = index === undefined ? "" : ` at inventory index ${index}`;
    super(`Invalid piece "${piece}"${where}: ${reason}`);
    this.name = "InvalidPieceError";
    this.piece = piece;
    this.index = index;
  }
}

/**
 * Rotate a quarter turn: every edge moves one position towards north.
 * (n, e, s, w) -> (e, s, w, n)
 */
export function rotatePiece(piece: Piece): Piece {
  return piece.slice(1) + piece[0];
}

/**
 * Turn the piece over about its north-south axis: east and west swap.
 * (n, e, s, w) -> (n, w, s, e)
 */
export function flipPiece(piece: Piece): Piece {
  return piece[NORTH] + piece[WEST] + piece[SOUTH] + piece[EAST];
}

/**
 * All 8 orientations: the piece and its 3 further rotations, then the
 * flipped piece and its 3 further rotations. Coinciding orientations of a
 * symmetric piece are kept.
 */
export function pieceOrientations(piece: Piece): Piece[] {
  const results: Piece[] = [piece];
  for (let i = 0; i < 3; i++) {
    results.push(rotatePiece(results[results.length - 1]));
  }
  results.push(flipPiece(piece));
  for (let i = 0; i < 3; i++) {
    results.push(rotatePiece(results[results.length - 1]));
  }
  return results;
}

/** Smallest orientation in string order; identifies the physical piece */
export function canonicalPiece(piece: Piece): Piece {
  let best = piece;
  for (const orientation of pieceOrientations(piece)) {
    if (orientation < best) best = orientation;
  }
  return best;
}

/** True when two of the piece's 8 orientations coincide */
export function isSymmetricPiece(piece: Piece): boolean {
  return new Set(pieceOrientations(piece)).size < 8;
}

/**
 * Validate a literal piece description against an alphabet.
 * Surrounding whitespace is dropped. A symbol the alphabet does not hold is
 * read upper-cased, so lower-case alphabets and mixed-case pairs keep their
 * own letters.
 */
export function parsePiece(description: string, alphabet: EdgeAlphabet, index?: number): Piece {
  const piece = Array.from(description.trim(), (symbol) =>
    alphabet.has(symbol) ? symbol : symbol.toUpperCase()
  ).join("");

  if (piece.length !== 4) {
    throw new InvalidPieceError(description, `expected 4 edge symbols, got ${piece.length}`, index);
  }
  for (const symbol of piece) {
    if (!alphabet.has(symbol)) {
      throw new InvalidPieceError(
        description,
        `edge symbol "${symbol}" has no complement in alphabet ${alphabet.symbols.join("")}`,
        index
      );
    }
  }

  return piece;
}

/**
 * Validate every description and reduce it to its canonical identity.
 * The result is sorted so the search starts from a reproducible pool.
 */
export function normalizeInventory(descriptions: readonly string[], alphabet: EdgeAlphabet): Piece[] {
  return descriptions
    .map((description, index) => canonicalPiece(parsePiece(description, alphabet, index)))
    .sort();
}
