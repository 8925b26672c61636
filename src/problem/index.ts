/**
 * Problem Module
 *
 * Edge-matching tiling: pieces, boards, the frontier search that enumerates
 * complete tilings, and the puzzle file format.
 */

// Edge alphabet
export {
  createEdgeAlphabet,
  DEFAULT_ALPHABET,
  DEFAULT_ALPHABET_PAIRS,
  InvalidAlphabetError,
} from "./edge-alphabet";
export type { EdgeAlphabet, EdgeSymbol, SymbolPair } from "./edge-alphabet";

// Pieces and their orientations
export {
  canonicalPiece,
  flipPiece,
  InvalidPieceError,
  isSymmetricPiece,
  normalizeInventory,
  parsePiece,
  pieceOrientations,
  rotatePiece,
} from "./edge-piece";
export type { Piece } from "./edge-piece";

// Boards
export {
  boardFromRows,
  boardKey,
  boardRows,
  createEmptyBoard,
  findNextEmpty,
  formatBoard,
  getCell,
  isBoardFull,
  pieceFits,
  placePiece,
} from "./edge-board";
export type { Board, CellPosition } from "./edge-board";

// Search
export { EXPLORATION_ORDERS, isExplorationOrder, SearchFrontier } from "./search-frontier";
export type { ExplorationOrder } from "./search-frontier";
export {
  collectSolutions,
  createRootState,
  createSearchCounters,
  DEFAULT_PROGRESS_INTERVAL,
  EdgeMatchingSearch,
  enumerateSolutions,
  SearchInvariantError,
  summarizeCounters,
} from "./edge-matching-search";
export type {
  CollectOptions,
  ProgressSnapshot,
  SearchCounters,
  SearchOptions,
  SearchResult,
  SearchState,
  SearchSummary,
  SolutionRecord,
} from "./edge-matching-search";

// Puzzle files
export {
  createPuzzle,
  createPuzzleRootState,
  loadPuzzleFile,
  parsePuzzleFile,
  parsePuzzleText,
  pieceCountMatchesBoard,
  PuzzleFileError,
  PuzzleFileSchema,
} from "./puzzle-schema";
export type { PuzzleFile, TilingPuzzle } from "./puzzle-schema";
