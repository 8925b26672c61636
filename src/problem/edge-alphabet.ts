/**
 * Edge Alphabet
 *
 * The symbols that may appear on a piece edge, and the pairing that says
 * which symbol fits against which. Two touching edges match when one
 * carries the complement of the other.
 */

/** A single-character edge symbol */
export type EdgeSymbol = string;

/** Pair of mutually complementary symbols */
export type SymbolPair = readonly [EdgeSymbol, EdgeSymbol];

export interface EdgeAlphabet {
  /** Symbols in declaration order */
  readonly symbols: readonly EdgeSymbol[];
  /** Pairs as declared */
  readonly pairs: readonly SymbolPair[];
  /** Complement of a symbol, or undefined when the symbol is not in the alphabet */
  complement(symbol: EdgeSymbol): EdgeSymbol | undefined;
  has(symbol: EdgeSymbol): boolean;
}

export class InvalidAlphabetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidAlphabetError";
  }
}

/**
 * Build an alphabet from complement pairs.
 *
 * Every symbol must be a single character and appear in exactly one pair,
 * which makes the complement function total and involutive.
 */
export function createEdgeAlphabet(pairs: readonly SymbolPair[]): EdgeAlphabet {
  if (pairs.length === 0) {
    throw new InvalidAlphabetError("Alphabet needs at least one symbol pair");
  }

  const complements = new Map<EdgeSymbol, EdgeSymbol>();
  const symbols: EdgeSymbol[] = [];

  for (const [a, b] of pairs) {
    if (a === b) {
      throw new InvalidAlphabetError(`Edge symbol "${a}" cannot be its own complement`);
    }
    for (const symbol of [a, b]) {
      if (symbol.length !== 1) {
        throw new InvalidAlphabetError(`Edge symbol "${symbol}" must be a single character`);
      }
      if (complements.has(symbol)) {
        throw new InvalidAlphabetError(`Edge symbol "${symbol}" is paired more than once`);
      }
    }
    complements.set(a, b);
    complements.set(b, a);
    symbols.push(a, b);
  }

  return {
    symbols,
    pairs: pairs.map(([a, b]): SymbolPair => [a, b]),
    complement: (symbol) => complements.get(symbol),
    has: (symbol) => complements.has(symbol),
  };
}

/**
 * Reference alphabet: four picture shapes, each with a matching socket.
 * A = cross, C = circle, E = tree, G = boat; B, D, F, H are their sockets.
 */
export const DEFAULT_ALPHABET_PAIRS: readonly SymbolPair[] = [
  ["A", "B"],
  ["C", "D"],
  ["E", "F"],
  ["G", "H"],
];

export const DEFAULT_ALPHABET: EdgeAlphabet = createEdgeAlphabet(DEFAULT_ALPHABET_PAIRS);
