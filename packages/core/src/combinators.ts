/**
 * Combinator API for @token-combinator/core
 *
 * Every combinator takes parsers and returns a new parser. Failures are plain
 * return values; a combinator that backtracks simply reuses the slice it was
 * handed.
 */

import { mergeErrors, notEnoughToken, withContext, withTokensConsumed } from "./errors.js";
import type { TokenSlice } from "./slice.js";
import type { ParseResult, TokenParseError, TokenParser } from "./types.js";

// ---------------------------------------------------------------------------
// Result helpers
// ---------------------------------------------------------------------------

export function success<T, O, W>(rest: TokenSlice<W>, value: O): ParseResult<T, O, W> {
  return { ok: true, rest, value };
}

export function failure<T, O, W>(error: TokenParseError<T>): ParseResult<T, O, W> {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Optionality and repetition
// ---------------------------------------------------------------------------

/**
 * Succeed with `undefined` and the untouched input when `parser` fails.
 * Never fails.
 */
export function opt<T, O, W>(parser: TokenParser<T, O, W>): TokenParser<T, O | undefined, W> {
  return (tokens) => {
    const r = parser(tokens);
    if (r.ok) return r;
    return success(tokens, undefined);
  };
}

/** Zero or more repetitions. Never fails. */
export function many0<T, O, W>(parser: TokenParser<T, O, W>): TokenParser<T, O[], W> {
  return (tokens) => {
    const items: O[] = [];
    let rest = tokens;
    while (!rest.isEmpty()) {
      const r = parser(rest);
      if (!r.ok) break;
      if (r.rest.length === rest.length) break; // no progress
      items.push(r.value);
      rest = r.rest;
    }
    return success(rest, items);
  };
}

/**
 * One or more repetitions. A failure of the first attempt is returned as the
 * inner parser produced it.
 */
export function many1<T, O, W>(parser: TokenParser<T, O, W>): TokenParser<T, O[], W> {
  return (tokens) => {
    const first = parser(tokens);
    if (!first.ok) return failure(first.error);
    const items: O[] = [first.value];
    let rest = first.rest;
    if (rest.length === tokens.length) return success(rest, items);
    while (!rest.isEmpty()) {
      const r = parser(rest);
      if (!r.ok) break;
      if (r.rest.length === rest.length) break;
      items.push(r.value);
      rest = r.rest;
    }
    return success(rest, items);
  };
}

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

/** Any parser, whatever its token, output and wrapper types. */
export type AnyTokenParser = (tokens: TokenSlice<never>) => ParseResult<unknown, unknown, unknown>;

/** Output type of a parser. */
export type OutputOf<P> = P extends (tokens: never) => ParseResult<unknown, infer O, unknown> ? O : never;

/** Token type a parser reports in its errors. */
export type TokenOf<P> = P extends (tokens: never) => ParseResult<infer T, unknown, unknown> ? T : never;

/** Wrapper type of the input a parser reads. */
export type WrapperOf<P> = P extends (tokens: never) => ParseResult<unknown, unknown, infer W> ? W : never;

/** Output tuple of a tuple of parsers. */
export type OutputsOf<Ps extends readonly AnyTokenParser[]> = {
  -readonly [K in keyof Ps]: OutputOf<Ps[K]>;
};

/**
 * Apply `parsers` in order, threading the remaining input, and collect their
 * outputs. Fails with the first failing parser's error.
 */
export function tuple<Ps extends readonly AnyTokenParser[]>(
  ...parsers: Ps
): TokenParser<TokenOf<Ps[number]>, OutputsOf<Ps>, WrapperOf<Ps[number]>>;
export function tuple<T, W>(...parsers: TokenParser<T, unknown, W>[]): TokenParser<T, unknown[], W> {
  return (tokens) => {
    const values: unknown[] = [];
    let rest = tokens;
    for (const parser of parsers) {
      const r = parser(rest);
      if (!r.ok) return failure(r.error);
      values.push(r.value);
      rest = r.rest;
    }
    return success(rest, values);
  };
}

/** Parse `left`, `main`, `right` in order and keep only `main`'s output. */
export function delimited<T, L, O, R, W>(
  left: TokenParser<T, L, W>,
  main: TokenParser<T, O, W>,
  right: TokenParser<T, R, W>
): TokenParser<T, O, W> {
  return (tokens) => {
    const rl = left(tokens);
    if (!rl.ok) return failure(rl.error);
    const rm = main(rl.rest);
    if (!rm.ok) return rm;
    const rr = right(rm.rest);
    if (!rr.ok) return failure(rr.error);
    return success(rr.rest, rm.value);
  };
}

// ---------------------------------------------------------------------------
// Separated lists
// ---------------------------------------------------------------------------

/**
 * Shared loop of the separated-list combinators, entered after the first item
 * has been parsed. Stops quietly on any item or separator failure; a
 * separator that is not followed by an item stays consumed.
 */
function continueList<T, O, S, W>(
  separator: TokenParser<T, S, W>,
  item: TokenParser<T, O, W>,
  rest: TokenSlice<W>,
  items: O[]
): ParseResult<T, O[], W> {
  for (;;) {
    if (rest.isEmpty()) return success(rest, items);
    const roundStart = rest;
    const rs = separator(rest);
    if (!rs.ok) return success(rest, items);
    rest = rs.rest;
    const ri = item(rest);
    if (!ri.ok) return success(rest, items);
    rest = ri.rest;
    items.push(ri.value);
    if (rest.length === roundStart.length) return success(rest, items); // no progress
  }
}

/**
 * Zero or more `item`s separated by `separator`. A trailing separator is
 * consumed. Never fails.
 */
export function separatedList0<T, O, S, W>(
  separator: TokenParser<T, S, W>,
  item: TokenParser<T, O, W>
): TokenParser<T, O[], W> {
  return (tokens) => {
    if (tokens.isEmpty()) return success(tokens, []);
    const first = item(tokens);
    if (!first.ok) return success(tokens, []);
    return continueList(separator, item, first.rest, [first.value]);
  };
}

/**
 * One or more `item`s separated by `separator`. Empty input fails with
 * `notEnoughToken`; a failing first item fails with its own error kinds.
 */
export function separatedList1<T, O, S, W>(
  separator: TokenParser<T, S, W>,
  item: TokenParser<T, O, W>
): TokenParser<T, O[], W> {
  return (tokens) => {
    if (tokens.isEmpty()) return failure(notEnoughToken<T>(0));
    const first = item(tokens);
    if (!first.ok) return failure(withTokensConsumed(first.error, 0));
    return continueList(separator, item, first.rest, [first.value]);
  };
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/**
 * Ordered choice: the first parser to succeed wins.
 *
 * When every variant fails, the error reports the failure(s) that consumed
 * the most tokens. Variants tied at that count have their error kinds merged
 * in the order they were tried.
 */
export function alt<T, O, W>(
  first: TokenParser<T, O, W>,
  ...rest: TokenParser<T, O, W>[]
): TokenParser<T, O, W> {
  const variants = [first, ...rest];
  return (tokens) => {
    const errors: TokenParseError<T>[] = [];
    for (const variant of variants) {
      const r = variant(tokens);
      if (r.ok) return r;
      errors.push(r.error);
    }
    const furthest = Math.max(...errors.map((e) => e.tokensConsumed));
    const [head, ...tail] = errors.filter((e) => e.tokensConsumed === furthest);
    return failure(mergeErrors(head, ...tail));
  };
}

// ---------------------------------------------------------------------------
// Transformation and diagnostics
// ---------------------------------------------------------------------------

/** Transform a successful output; failures pass through untouched. */
export function map<T, A, B, W>(parser: TokenParser<T, A, W>, f: (value: A) => B): TokenParser<T, B, W> {
  return (tokens) => {
    const r = parser(tokens);
    if (!r.ok) return failure(r.error);
    return success(r.rest, f(r.value));
  };
}

/** Label failures of `parser` with the grammar rule being attempted. */
export function context<T, O, W>(label: string, parser: TokenParser<T, O, W>): TokenParser<T, O, W> {
  return (tokens) => {
    const r = parser(tokens);
    if (r.ok) return r;
    return failure(withContext(r.error, label));
  };
}

/** Lazy parser for recursive grammars. `build` runs on first use. */
export function lazy<T, O, W>(build: () => TokenParser<T, O, W>): TokenParser<T, O, W> {
  let cached: TokenParser<T, O, W> | null = null;
  return (tokens) => {
    if (!cached) cached = build();
    return cached(tokens);
  };
}
