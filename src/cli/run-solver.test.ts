/**
 * Tests for the command-line driver: flags and the printed report.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { CliUsageError, parseCliArguments, runSolver, type SolverRunConfig } from "./run-solver";

const TWO_BY_TWO = fileURLToPath(new URL("../../puzzles/two-by-two.json", import.meta.url));

const RULER = "=".repeat(60);

const tempDirs: string[] = [];
const removedDirs: string[] = [];

/** Write a puzzle file into a fresh directory removed after each test */
function writePuzzle(name: string, contents: unknown): string {
  const dir = mkdtempSync(path.join(tmpdir(), "edge-tiles-"));
  tempDirs.push(dir);
  const puzzlePath = path.join(dir, name);
  writeFileSync(puzzlePath, JSON.stringify(contents));
  return puzzlePath;
}

function runCaptured(config: Partial<SolverRunConfig>) {
  const lines: string[] = [];
  // Search starts at t=0; every later reading is one second in
  const now = vi.fn(() => 1000).mockReturnValueOnce(0);
  const summary = runSolver(
    {
      puzzlePath: TWO_BY_TWO,
      order: "depth-first",
      limit: undefined,
      progressInterval: 100,
      quiet: false,
      ...config,
    },
    (line) => lines.push(line),
    now
  );
  return { lines, summary };
}

describe("parseCliArguments", () => {
  it("should default to the reference puzzle, depth-first, with progress", () => {
    expect(parseCliArguments([], "reference.json")).toEqual({
      kind: "run",
      config: {
        puzzlePath: "reference.json",
        order: "depth-first",
        limit: undefined,
        progressInterval: 10000,
        quiet: false,
      },
    });
  });

  it("should read every flag", () => {
    const argv = ["mine.json", "-o", "breadth-first", "-n", "5", "--progress-interval", "200", "-q"];
    expect(parseCliArguments(argv, "reference.json")).toEqual({
      kind: "run",
      config: {
        puzzlePath: "mine.json",
        order: "breadth-first",
        limit: 5,
        progressInterval: 200,
        quiet: true,
      },
    });
  });

  it("should recognise --help", () => {
    expect(parseCliArguments(["--help"], "reference.json")).toEqual({ kind: "help" });
  });

  it("should reject bad values and unknown flags", () => {
    expect(() => parseCliArguments(["--order", "random"], "r.json")).toThrow(
      '--order must be depth-first or breadth-first, got "random"'
    );
    expect(() => parseCliArguments(["--limit", "0"], "r.json")).toThrow(
      '--limit expects a positive integer, got "0"'
    );
    expect(() => parseCliArguments(["a.json", "b.json"], "r.json")).toThrow(
      "Expected at most one puzzle file, got 2"
    );
    expect(() => parseCliArguments(["--bogus"], "r.json")).toThrow(CliUsageError);
  });
});

describe("runSolver", () => {
  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
      removedDirs.push(dir);
    }
  });

  it("should print the puzzle before searching", () => {
    const { lines } = runCaptured({});
    expect(lines.slice(0, 6)).toEqual([
      RULER,
      "Puzzle two-by-two: 2x2, 4 pieces, depth-first",
      RULER,
      "   _    _\n   _    _",
      "[ABFC, BBFH, BEFF, DGHH]",
      "",
    ]);
  });

  it("should print each solution with its counters and rates", () => {
    const { lines } = runCaptured({});
    const first = lines.indexOf("Solutions found: 1");
    expect(lines.slice(first, first + 7)).toEqual([
      "Solutions found: 1",
      "Solutions per second: 1.00",
      "States explored: 41",
      "States per second: 41.00",
      "Frontier size: 30",
      "HGDH BBFH\nCABF EFFB",
      "",
    ]);
    expect(lines.filter((line) => line.startsWith("Solutions found: "))).toHaveLength(8);
  });

  it("should print progress between solutions", () => {
    const { lines } = runCaptured({});
    const progress = lines.indexOf("Best partial board so far:");
    expect(lines.slice(progress - 2, progress + 4)).toEqual([
      "States explored: 100",
      "Frontier size: 11",
      "Best partial board so far:",
      "FHBB HHDG\nABFC    _",
      "[BEFF]",
      "",
    ]);
    expect(lines[progress - 3]).toBe("");
    expect(lines.indexOf("Solutions found: 5")).toBeLessThan(progress);
    expect(lines.indexOf("Solutions found: 6")).toBeGreaterThan(progress);
  });

  it("should end with a summary of an exhausted search", () => {
    const { lines, summary } = runCaptured({ quiet: true });
    expect(lines).not.toContain("Best partial board so far:");
    expect(lines.slice(-6)).toEqual([
      RULER,
      "Search exhausted: all solutions found",
      "  Solutions: 8",
      "  States explored: 168",
      "  Peak frontier size: 33",
      "  Elapsed: 1000ms",
    ]);
    expect(summary.exhausted).toBe(true);
  });

  it("should stop at the solution limit", () => {
    const { lines, summary } = runCaptured({ limit: 2, quiet: true });
    expect(lines.filter((line) => line.startsWith("Solutions found: "))).toEqual([
      "Solutions found: 1",
      "Solutions found: 2",
    ]);
    expect(lines.slice(-5, -3)).toEqual(["Search stopped at the solution limit", "  Solutions: 2"]);
    expect(summary).toEqual({ explored: 46, solutions: 2, peakFrontierSize: 33, exhausted: false });
  });

  it("should list pieces with repeated orientations", () => {
    const puzzlePath = writePuzzle("stripes.json", { rows: 1, cols: 2, pieces: ["BABA", "ACDB"] });

    const { lines } = runCaptured({ puzzlePath, quiet: true, limit: 1 });
    expect(lines.slice(4, 7)).toEqual(["[ABAB, ABDC]", "", "Symmetric pieces: [ABAB]"]);
  });

  it("should warn about a piece count that cannot fill the board and still search", () => {
    const puzzlePath = writePuzzle("short.json", { rows: 2, cols: 2, pieces: ["BACF", "FFEB", "DGHH"] });

    const { lines, summary } = runCaptured({ puzzlePath, quiet: true });
    expect(lines[1]).toBe("Puzzle 2x2: 2x2, 3 pieces, depth-first");
    expect(lines).toContain("Warning: 3 pieces for 4 cells, no solution is possible");
    expect(lines.slice(-5, -3)).toEqual(["Search exhausted: no solutions exist", "  Solutions: 0"]);
    expect(summary).toEqual({ explored: 64, solutions: 0, peakFrontierSize: 25, exhausted: true });
  });

  it("should leave no puzzle directories behind", () => {
    expect(tempDirs).toEqual([]);
    expect(removedDirs).toHaveLength(2);
    for (const dir of removedDirs) expect(existsSync(dir)).toBe(false);
  });
});
