/**
 * Core types for @token-combinator/core
 *
 * Defines the error model, the parse result and the parser call contract.
 *
 * Type parameter conventions used throughout the package:
 * - `T`: token, the raw lexical category reported in diagnostics
 * - `O`: output produced by a successful parse
 * - `W`: wrapper, the element actually stored in the input (defaults to `T`)
 */

import type { TokenSlice } from "./slice.js";

// ---------------------------------------------------------------------------
// Error model
// ---------------------------------------------------------------------------

/** One reason a parse attempt failed. */
export type TokenParseErrorKind<T> =
  | {
      readonly kind: "expects";
      /** Static description of the token kind that was required. */
      readonly expects: string;
      /** The token actually present. */
      readonly found: T;
    }
  | { readonly kind: "notEnoughToken" }
  | {
      readonly kind: "context";
      /** Grammar rule that was being attempted. */
      readonly label: string;
    };

/**
 * A failed parse. `errors` lists the innermost failure first; context labels
 * pushed by enclosing rules follow it.
 */
export interface TokenParseError<T> {
  readonly errors: readonly TokenParseErrorKind<T>[];
  /** Tokens consumed before the fatal point, used to rank competing failures. */
  readonly tokensConsumed: number;
}

// ---------------------------------------------------------------------------
// Parse result
// ---------------------------------------------------------------------------

/** Result of a parse attempt: the remaining input and a value, or an error. */
export type ParseResult<T, O, W = T> =
  | { readonly ok: true; readonly rest: TokenSlice<W>; readonly value: O }
  | { readonly ok: false; readonly error: TokenParseError<T> };

// ---------------------------------------------------------------------------
// Parser abstraction
// ---------------------------------------------------------------------------

/**
 * A parser takes the remaining input and either narrows it and produces an
 * output, or fails. Any function with this signature is a parser.
 *
 * A parser instance may keep state across the calls made by repetition
 * combinators, so a single instance must not be re-entered concurrently.
 * Independently built instances share nothing.
 */
export interface TokenParser<T, O, W = T> {
  (tokens: TokenSlice<W>): ParseResult<T, O, W>;
}

/** Converts a stored wrapper into the token reported in diagnostics. */
export type ToToken<W, T> = (wrapper: W) => T;
