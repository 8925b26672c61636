/**
 * Command-line driver for the edge-matching search: argument parsing and
 * the console report. The log sink and clock are parameters.
 */

import { parseArgs } from "util";
import { formatBoard, type Board } from "../problem/edge-board";
import { isSymmetricPiece, type Piece } from "../problem/edge-piece";
import {
  DEFAULT_PROGRESS_INTERVAL,
  createSearchCounters,
  enumerateSolutions,
  summarizeCounters,
  type ProgressSnapshot,
  type SearchSummary,
} from "../problem/edge-matching-search";
import {
  createPuzzle,
  createPuzzleRootState,
  loadPuzzleFile,
  pieceCountMatchesBoard,
} from "../problem/puzzle-schema";
import { isExplorationOrder, type ExplorationOrder } from "../problem/search-frontier";

export interface SolverRunConfig {
  puzzlePath: string;
  order: ExplorationOrder;
  /** Stop after this many solutions; undefined runs to exhaustion */
  limit: number | undefined;
  progressInterval: number;
  /** Suppress progress snapshots */
  quiet: boolean;
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "run"; config: SolverRunConfig };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "Usage: solve-puzzle [puzzle.json] [options]",
  "",
  "Options:",
  "  -o, --order <order>          depth-first (default) or breadth-first",
  "  -n, --limit <count>          stop after this many solutions",
  "  -p, --progress-interval <n>  report progress every n explored states",
  "  -q, --quiet                  no progress reports",
  "  -h, --help                   show this message",
].join("\n");

function parsePositiveInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CliUsageError(`--${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

function readArguments(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        order: { type: "string", short: "o" },
        limit: { type: "string", short: "n" },
        "progress-interval": { type: "string", short: "p" },
        quiet: { type: "boolean", short: "q" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArguments(argv: string[], defaultPuzzlePath: string): CliCommand {
  const { values, positionals } = readArguments(argv);
  if (values.help) return { kind: "help" };

  if (positionals.length > 1) {
    throw new CliUsageError(`Expected at most one puzzle file, got ${positionals.length}`);
  }

  const order = values.order ?? "depth-first";
  if (!isExplorationOrder(order)) {
    throw new CliUsageError(`--order must be depth-first or breadth-first, got "${order}"`);
  }

  const progressFlag = values["progress-interval"];

  return {
    kind: "run",
    config: {
      puzzlePath: positionals[0] ?? defaultPuzzlePath,
      order,
      limit: values.limit === undefined ? undefined : parsePositiveInteger("limit", values.limit),
      progressInterval:
        progressFlag === undefined
          ? DEFAULT_PROGRESS_INTERVAL
          : parsePositiveInteger("progress-interval", progressFlag),
      quiet: values.quiet ?? false,
    },
  };
}

function formatPool(pool: readonly Piece[]): string {
  return `[${pool.join(", ")}]`;
}

function perSecond(count: number, elapsedMs: number): string {
  const seconds = Math.max(elapsedMs, 1) / 1000;
  return (count / seconds).toFixed(2);
}

export function formatSolutionReport(
  index: number,
  board: Board,
  explored: number,
  frontierSize: number,
  elapsedMs: number
): string[] {
  return [
    `Solutions found: ${index}`,
    `Solutions per second: ${perSecond(index, elapsedMs)}`,
    `States explored: ${explored}`,
    `States per second: ${perSecond(explored, elapsedMs)}`,
    `Frontier size: ${frontierSize}`,
    formatBoard(board),
    "",
  ];
}

export function formatProgressReport(snapshot: ProgressSnapshot): string[] {
  return [
    `States explored: ${snapshot.explored}`,
    `Frontier size: ${snapshot.frontierSize}`,
    "Best partial board so far:",
    formatBoard(snapshot.bestBoard),
    formatPool(snapshot.bestPool),
    "",
  ];
}

export function formatSummary(summary: SearchSummary, elapsedMs: number): string[] {
  const outcome = summary.exhausted
    ? summary.solutions === 0
      ? "Search exhausted: no solutions exist"
      : "Search exhausted: all solutions found"
    : "Search stopped at the solution limit";
  return [
    "=".repeat(60),
    outcome,
    `  Solutions: ${summary.solutions}`,
    `  States explored: ${summary.explored}`,
    `  Peak frontier size: ${summary.peakFrontierSize}`,
    `  Elapsed: ${elapsedMs.toFixed(0)}ms`,
  ];
}

/**
 * Load a puzzle, run the search and write the report line by line.
 */
export function runSolver(
  config: SolverRunConfig,
  log: (line: string) => void = console.log,
  now: () => number = () => performance.now()
): SearchSummary {
  const puzzle = createPuzzle(loadPuzzleFile(config.puzzlePath));
  const root = createPuzzleRootState(puzzle);
  const emit = (lines: string[]) => lines.forEach((line) => log(line));

  emit([
    "=".repeat(60),
    `Puzzle ${puzzle.name}: ${puzzle.rows}x${puzzle.cols}, ${puzzle.pool.length} pieces, ${config.order}`,
    "=".repeat(60),
    formatBoard(root.board),
    formatPool(puzzle.pool),
    "",
  ]);

  const symmetric = puzzle.pool.filter(isSymmetricPiece);
  if (symmetric.length > 0) {
    emit([`Symmetric pieces: ${formatPool(symmetric)}`, ""]);
  }

  if (!pieceCountMatchesBoard(puzzle)) {
    emit([
      `Warning: ${puzzle.pool.length} pieces for ${puzzle.rows * puzzle.cols} cells, no solution is possible`,
      "",
    ]);
  }

  const start = now();
  let found = 0;

  const counters = createSearchCounters(root);
  const solutions = enumerateSolutions(
    root,
    {
      order: config.order,
      alphabet: puzzle.alphabet,
      progressInterval: config.progressInterval,
      onProgress: config.quiet ? undefined : (snapshot) => emit(formatProgressReport(snapshot)),
    },
    counters
  );

  for (const solution of solutions) {
    found++;
    emit(formatSolutionReport(found, solution.board, solution.explored, solution.frontierSize, now() - start));
    if (config.limit !== undefined && found >= config.limit) break;
  }

  const summary = summarizeCounters(counters);
  emit(formatSummary(summary, now() - start));
  return summary;
}
