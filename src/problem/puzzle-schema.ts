/**
 * Puzzle file format.
 *
 * A puzzle is a JSON document naming the board size, the piece inventory
 * and, optionally, the edge alphabet:
 *
 *   { "rows": 4, "cols": 4, "pieces": ["EAGB", "CABD", ...],
 *     "alphabet": [["A", "B"], ["C", "D"], ...] }
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { createEdgeAlphabet, DEFAULT_ALPHABET, type EdgeAlphabet } from "./edge-alphabet";
import { normalizeInventory, type Piece } from "./edge-piece";
import { createRootState, type SearchState } from "./edge-matching-search";

export const PuzzleFileSchema = z.object({
  name: z.string().min(1).optional(),
  rows: z.number().int().positive(),
  cols: z.number().int().positive(),
  alphabet: z.array(z.tuple([z.string(), z.string()])).min(1).optional(),
  pieces: z.array(z.string()).min(1),
});

export type PuzzleFile = z.infer<typeof PuzzleFileSchema>;

/** A puzzle ready to search: alphabet built, inventory canonicalized */
export interface TilingPuzzle {
  name: string;
  rows: number;
  cols: number;
  alphabet: EdgeAlphabet;
  /** Canonical pieces, sorted */
  pool: Piece[];
}

export class PuzzleFileError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid puzzle file ${source}:\n${issues.map((issue) => `  ${issue}`).join("\n")}`);
    this.name = "PuzzleFileError";
    this.issues = issues;
  }
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/** Validate an already-parsed JSON value */
export function parsePuzzleFile(value: unknown, source: string = "<input>"): PuzzleFile {
  const result = PuzzleFileSchema.safeParse(value);
  if (!result.success) {
    throw new PuzzleFileError(source, result.error.issues.map(formatIssue));
  }
  return result.data;
}

export function parsePuzzleText(text: string, source: string = "<input>"): PuzzleFile {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PuzzleFileError(source, [`not valid JSON: ${message}`]);
  }
  return parsePuzzleFile(value, source);
}

export function loadPuzzleFile(path: string): PuzzleFile {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PuzzleFileError(path, [`cannot read file: ${message}`]);
  }
  return parsePuzzleText(text, path);
}

/**
 * Build the alphabet and canonical pool. Throws InvalidAlphabetError or
 * InvalidPieceError before any search starts.
 */
export function createPuzzle(file: PuzzleFile): TilingPuzzle {
  const alphabet = file.alphabet ? createEdgeAlphabet(file.alphabet) : DEFAULT_ALPHABET;
  return {
    name: file.name ?? `${file.rows}x${file.cols}`,
    rows: file.rows,
    cols: file.cols,
    alphabet,
    pool: normalizeInventory(file.pieces, alphabet),
  };
}

export function createPuzzleRootState(puzzle: TilingPuzzle): SearchState {
  return createRootState(puzzle.rows, puzzle.cols, puzzle.pool);
}

/**
 * A solution needs exactly one piece per cell. The search itself does not
 * check this; it simply finds nothing when the counts differ.
 */
export function pieceCountMatchesBoard(puzzle: TilingPuzzle): boolean {
  return puzzle.pool.length === puzzle.rows * puzzle.cols;
}
