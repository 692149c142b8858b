/**
 * Error constructors, transformations and rendering.
 *
 * Combinators never throw: failures travel as `{ ok: false, error }` values.
 * The classes at the bottom of this file are only raised by the throwing
 * entry point (`parseAll`) and by configuration loading.
 */

import type { TokenParseError, TokenParseErrorKind } from "./types.js";

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/** A specific token kind was required and `found` was present instead. */
export function expects<T>(expects: string, found: T, tokensConsumed = 0): TokenParseError<T> {
  return { errors: [{ kind: "expects", expects, found }], tokensConsumed };
}

/** Input ended before a required token. */
export function notEnoughToken<T>(tokensConsumed = 0): TokenParseError<T> {
  return { errors: [{ kind: "notEnoughToken" }], tokensConsumed };
}

// ---------------------------------------------------------------------------
// Transformations
// ---------------------------------------------------------------------------

/** Copy of `error` reporting `tokensConsumed` instead of its own count. */
export function withTokensConsumed<T>(
  error: TokenParseError<T>,
  tokensConsumed: number
): TokenParseError<T> {
  return { errors: error.errors, tokensConsumed };
}

/** Copy of `error` with a context label appended after the existing kinds. */
export function withContext<T>(error: TokenParseError<T>, label: string): TokenParseError<T> {
  return {
    errors: [...error.errors, { kind: "context", label }],
    tokensConsumed: error.tokensConsumed,
  };
}

/**
 * Concatenate the kinds of several errors, in order, keeping the largest
 * consumption count.
 */
export function mergeErrors<T>(
  first: TokenParseError<T>,
  ...rest: TokenParseError<T>[]
): TokenParseError<T> {
  const errors: TokenParseErrorKind<T>[] = [...first.errors];
  let tokensConsumed = first.tokensConsumed;
  for (const error of rest) {
    errors.push(...error.errors);
    tokensConsumed = Math.max(tokensConsumed, error.tokensConsumed);
  }
  return { errors, tokensConsumed };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function formatKind<T>(kind: TokenParseErrorKind<T>, describeToken: (token: T) => string): string {
  switch (kind.kind) {
    case "expects":
      return `expected ${kind.expects}, found ${describeToken(kind.found)}`;
    case "notEnoughToken":
      return "unexpected end of input";
    case "context":
      return `in ${kind.label}`;
  }
}

/**
 * Render an error as a single line, e.g.
 * `parse failed after 2 tokens: expected digit, found Comma; in list`.
 */
export function formatParseError<T>(
  error: TokenParseError<T>,
  describeToken: (token: T) => string = String
): string {
  const parts = error.errors.map((kind) => formatKind(kind, describeToken));
  return `parse failed after ${plural(error.tokensConsumed, "token")}: ${parts.join("; ")}`;
}

// ---------------------------------------------------------------------------
// Thrown errors
// ---------------------------------------------------------------------------

/** Base class for everything this package throws. */
export class TokenCombinatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenCombinatorError";
  }
}

/** A parse run through `parseAll` failed. */
export class TokenParseFailure<T> extends TokenCombinatorError {
  readonly error: TokenParseError<T>;

  constructor(error: TokenParseError<T>, describeToken?: (token: T) => string) {
    super(formatParseError(error, describeToken));
    this.name = "TokenParseFailure";
    this.error = error;
  }
}

/** A parse run through `parseAll` succeeded without consuming the whole input. */
export class TrailingTokensError extends TokenCombinatorError {
  readonly consumed: number;
  readonly remaining: number;

  constructor(consumed: number, remaining: number) {
    super(
      `parse stopped after ${plural(consumed, "token")} with ${plural(remaining, "token")} left`
    );
    this.name = "TrailingTokensError";
    this.consumed = consumed;
    this.remaining = remaining;
  }
}

/** A configuration source held a value of the wrong type. */
export class ConfigError extends TokenCombinatorError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
