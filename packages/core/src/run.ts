/**
 * Entry points that run a parser over a token array.
 */

import { TokenParseFailure, TrailingTokensError } from "./errors.js";
import { TokenSlice } from "./slice.js";
import type { ParseResult, TokenParser } from "./types.js";

function toSlice<W>(tokens: readonly W[] | TokenSlice<W>): TokenSlice<W> {
  return tokens instanceof TokenSlice ? tokens : TokenSlice.of(tokens);
}

/** Run `parser` once over `tokens` and return its raw result. */
export function parse<T, O, W>(
  parser: TokenParser<T, O, W>,
  tokens: readonly W[] | TokenSlice<W>
): ParseResult<T, O, W> {
  return parser(toSlice(tokens));
}

export interface ParseAllOptions<T> {
  /** Rendering of tokens in the thrown error's message. */
  describeToken?: (token: T) => string;
}

/**
 * Run `parser` over `tokens`, requiring it to consume all of them.
 *
 * @throws TokenParseFailure if the parser fails
 * @throws TrailingTokensError if tokens are left over
 */
export function parseAll<T, O, W>(
  parser: TokenParser<T, O, W>,
  tokens: readonly W[] | TokenSlice<W>,
  options: ParseAllOptions<T> = {}
): O {
  const input = toSlice(tokens);
  const r = parser(input);
  if (!r.ok) {
    throw new TokenParseFailure(r.error, options.describeToken);
  }
  if (!r.rest.isEmpty()) {
    throw new TrailingTokensError(r.rest.consumedSince(input), r.rest.length);
  }
  return r.value;
}
