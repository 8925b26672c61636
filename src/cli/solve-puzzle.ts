/**
 * Solve an edge-matching puzzle from the command line.
 *
 * Run with: npx tsx src/cli/solve-puzzle.ts [puzzle.json] [--order breadth-first] [--limit 10]
 *
 * Without a puzzle file, solves the bundled 4x4 reference puzzle.
 */

import * as path from "path";
import { fileURLToPath } from "url";
import { InvalidAlphabetError } from "../problem/edge-alphabet";
import { InvalidPieceError } from "../problem/edge-piece";
import { PuzzleFileError } from "../problem/puzzle-schema";
import { CliUsageError, USAGE, parseCliArguments, runSolver } from "./run-solver";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const REFERENCE_PUZZLE = path.join(__dirname, "../../puzzles/ultimate-puzzle.json");

function main(): void {
  try {
    const command = parseCliArguments(process.argv.slice(2), REFERENCE_PUZZLE);
    if (command.kind === "help") {
      console.log(USAGE);
      return;
    }
    runSolver(command.config);
  } catch (error) {
    if (
      error instanceof CliUsageError ||
      error instanceof PuzzleFileError ||
      error instanceof InvalidPieceError ||
      error instanceof InvalidAlphabetError
    ) {
      console.error(error.message);
      if (error instanceof CliUsageError) console.error(`\n${USAGE}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

main();
