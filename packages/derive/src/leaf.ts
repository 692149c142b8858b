/**
 * Leaf parsers: match exactly one token.
 *
 * A leaf looks at the next token only. On a match it consumes that token and
 * returns the selected value; otherwise it fails without consuming anything,
 * with `notEnoughToken` on empty input or `expects` naming what it wanted.
 */

import { expects as expectsError, failure, notEnoughToken, success } from "@token-combinator/core";
import type { ToToken, TokenParser } from "@token-combinator/core";

/** Returned by a selector to reject a token. */
export const noMatch: unique symbol = Symbol("noMatch");
export type NoMatch = typeof noMatch;

/** Picks the output for a matching token, or rejects it with `noMatch`. */
export type Selector<T, O, W = T> = (token: T, wrapper: W) => O | NoMatch;

/**
 * Leaf over inputs whose elements carry extra data. `toToken` recovers the
 * token used for matching and for diagnostics.
 */
export function wrappedLeaf<T, O, W>(
  expects: string,
  select: Selector<T, O, W>,
  toToken: ToToken<W, T>
): TokenParser<T, O, W> {
  return (tokens) => {
    const head = tokens.head();
    if (head === undefined) return failure(notEnoughToken<T>(0));
    const [wrapper, rest] = head;
    const token = toToken(wrapper);
    const value = select(token, wrapper);
    if (value === noMatch) return failure(expectsError(expects, token, 0));
    return success(rest, value);
  };
}

/** Leaf over inputs whose elements are the tokens themselves. */
export function leaf<T, O>(expects: string, select: Selector<T, O>): TokenParser<T, O> {
  return wrappedLeaf(expects, select, (token: T) => token);
}
