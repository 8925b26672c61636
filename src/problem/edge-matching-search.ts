/**
 * Edge-Matching Tiling Search
 *
 * Enumerates every way to fill a board with a pool of pieces so that all
 * touching edges are complementary. Works through a frontier of
 * (board, pool) states: each state taken from the frontier gets the next
 * empty cell (row-major) filled with every remaining piece in every
 * orientation that fits. Children that use up the pool on a full board are
 * solutions and are yielded straight away; the rest go back on the frontier.
 *
 * The search is lazy. Solutions come out of a generator, so a caller can
 * stop after the first one, and each new iteration starts over from the
 * root state. The engine does no I/O: progress goes to an optional callback.
 */

import { DEFAULT_ALPHABET, type EdgeAlphabet } from "./edge-alphabet";
import {
  createEmptyBoard,
  findNextEmpty,
  isBoardFull,
  pieceFits,
  placePiece,
  type Board,
} from "./edge-board";
import { pieceOrientations, type Piece } from "./edge-piece";
import { SearchFrontier, type ExplorationOrder } from "./search-frontier";

/** A partial board together with the pieces still to place */
export interface SearchState {
  board: Board;
  pool: readonly Piece[];
}

export interface SolutionRecord {
  board: Board;
  /** States generated so far, this solution included */
  explored: number;
  /** States waiting on the frontier when the solution was found */
  frontierSize: number;
}

export interface ProgressSnapshot {
  explored: number;
  frontierSize: number;
  /** Queued state with the fewest pieces left (latest one on ties) */
  bestBoard: Board;
  bestPool: readonly Piece[];
}

export interface SearchOptions {
  /** Defaults to depth-first */
  order?: ExplorationOrder;
  alphabet?: EdgeAlphabet;
  /** Report progress every this many explored states (default 10000) */
  progressInterval?: number;
  onProgress?: (snapshot: ProgressSnapshot) => void;
}

export interface SearchSummary {
  explored: number;
  solutions: number;
  peakFrontierSize: number;
  /** True once every reachable state has been expanded */
  exhausted: boolean;
}

/**
 * Mutable per-run bookkeeping. Created fresh for each run and passed
 * through the search, so concurrent searches never share counters.
 */
export interface SearchCounters {
  explored: number;
  solutions: number;
  frontierSize: number;
  peakFrontierSize: number;
  best: SearchState;
  exhausted: boolean;
}

export const DEFAULT_PROGRESS_INTERVAL = 10000;

/** Raised when the search reaches a state its own bookkeeping rules out */
export class SearchInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SearchInvariantError";
  }
}

export function createRootState(rows: number, cols: number, pool: readonly Piece[]): SearchState {
  return { board: createEmptyBoard(rows, cols), pool: [...pool] };
}

export function createSearchCounters(root: SearchState): SearchCounters {
  return {
    explored: 0,
    solutions: 0,
    frontierSize: 0,
    peakFrontierSize: 0,
    best: root,
    exhausted: false,
  };
}

export function summarizeCounters(counters: SearchCounters): SearchSummary {
  return {
    explored: counters.explored,
    solutions: counters.solutions,
    peakFrontierSize: counters.peakFrontierSize,
    exhausted: counters.exhausted,
  };
}

/**
 * Every child of a state: the next empty cell filled with each pool
 * piece, in each of its orientations, that fits there.
 */
function* expandState(
  state: SearchState,
  alphabet: EdgeAlphabet,
  orientationsOf: (piece: Piece) => readonly Piece[]
): Generator<SearchState> {
  const position = findNextEmpty(state.board);
  if (position === null) {
    if (state.pool.length === 0) {
      throw new SearchInvariantError("A completed board was queued instead of being reported");
    }
    // More pieces than cells: nothing left to fill
    return;
  }

  for (let i = 0; i < state.pool.length; i++) {
    const pool = [...state.pool.slice(0, i), ...state.pool.slice(i + 1)];
    for (const orientation of orientationsOf(state.pool[i])) {
      if (pieceFits(state.board, orientation, position, alphabet)) {
        yield { board: placePiece(state.board, orientation, position), pool };
      }
    }
  }
}

function* runSearch(
  root: SearchState,
  order: ExplorationOrder,
  alphabet: EdgeAlphabet,
  progressInterval: number,
  onProgress: ((snapshot: ProgressSnapshot) => void) | undefined,
  counters: SearchCounters
): Generator<SolutionRecord, SearchSummary, undefined> {
  const orientationCache = new Map<Piece, readonly Piece[]>();
  const orientationsOf = (piece: Piece): readonly Piece[] => {
    let orientations = orientationCache.get(piece);
    if (!orientations) {
      orientations = pieceOrientations(piece);
      orientationCache.set(piece, orientations);
    }
    return orientations;
  };

  const frontier = new SearchFrontier<SearchState>(order);
  frontier.push(root);
  counters.frontierSize = frontier.size;
  counters.peakFrontierSize = Math.max(counters.peakFrontierSize, frontier.size);

  let state = frontier.take();
  while (state !== undefined) {
    counters.frontierSize = frontier.size;

    for (const child of expandState(state, alphabet, orientationsOf)) {
      counters.explored++;

      if (child.pool.length === 0) {
        // Fewer pieces than cells: the pool ran out before the board filled
        if (!isBoardFull(child.board)) continue;
        counters.solutions++;
        yield { board: child.board, explored: counters.explored, frontierSize: frontier.size };
        continue;
      }

      frontier.push(child);
      counters.frontierSize = frontier.size;
      counters.peakFrontierSize = Math.max(counters.peakFrontierSize, frontier.size);

      if (child.pool.length <= counters.best.pool.length) {
        counters.best = child;
      }

      if (onProgress && counters.explored % progressInterval === 0) {
        onProgress({
          explored: counters.explored,
          frontierSize: frontier.size,
          bestBoard: counters.best.board,
          bestPool: counters.best.pool,
        });
      }
    }

    state = frontier.take();
  }

  counters.frontierSize = 0;
  counters.exhausted = true;
  return summarizeCounters(counters);
}

/**
 * Lazily enumerate all solutions reachable from a root state.
 *
 * The generator's return value is the final summary. Pass your own
 * counters to read the explored count and best partial state after
 * stopping early.
 */
export function enumerateSolutions(
  root: SearchState,
  options: SearchOptions = {},
  counters: SearchCounters = createSearchCounters(root)
): Generator<SolutionRecord, SearchSummary, undefined> {
  const {
    order = "depth-first",
    alphabet = DEFAULT_ALPHABET,
    progressInterval = DEFAULT_PROGRESS_INTERVAL,
    onProgress,
  } = options;

  if (!Number.isInteger(progressInterval) || progressInterval <= 0) {
    throw new RangeError(`progressInterval must be a positive integer, got ${progressInterval}`);
  }

  return runSearch(root, order, alphabet, progressInterval, onProgress, counters);
}

export interface CollectOptions extends SearchOptions {
  /** Stop after this many solutions */
  limit?: number;
}

export interface SearchResult {
  solutions: SolutionRecord[];
  summary: SearchSummary;
}

/**
 * Run the search to exhaustion, or until `limit` solutions are found.
 * `summary.exhausted` separates "no more solutions exist" from
 * "stopped early".
 */
export function collectSolutions(root: SearchState, options: CollectOptions = {}): SearchResult {
  const { limit = Infinity, ...searchOptions } = options;
  if (!(limit >= 1) || (limit !== Infinity && !Number.isInteger(limit))) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }

  const counters = createSearchCounters(root);
  const solutions: SolutionRecord[] = [];

  for (const solution of enumerateSolutions(root, searchOptions, counters)) {
    solutions.push(solution);
    if (solutions.length >= limit) break;
  }

  return { solutions, summary: summarizeCounters(counters) };
}

/**
 * A search over a fixed root state. Iterating it runs the search from the
 * root; iterating again starts over.
 */
export class EdgeMatchingSearch implements Iterable<SolutionRecord> {
  readonly root: SearchState;
  private readonly options: SearchOptions;

  constructor(root: SearchState, options: SearchOptions = {}) {
    this.root = root;
    this.options = options;
  }

  [Symbol.iterator](): Iterator<SolutionRecord> {
    return enumerateSolutions(this.root, this.options);
  }

  collect(limit?: number): SearchResult {
    return collectSolutions(this.root, { ...this.options, limit });
  }
}
