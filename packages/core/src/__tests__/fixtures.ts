import { expects, failure, formatParseError, notEnoughToken, success } from "../index.js";
import { TokenSlice } from "../slice.js";
import type { TokenParseError, TokenParser } from "../types.js";

export type Tok =
  | { type: "Digit"; value: number }
  | { type: "Comma" }
  | { type: "LParen" }
  | { type: "RParen" };

export const D = (value: number): Tok => ({ type: "Digit", value });
export const COMMA: Tok = { type: "Comma" };
export const LP: Tok = { type: "LParen" };
export const RP: Tok = { type: "RParen" };

export const describeTok = (t: Tok): string => t.type;

export const digit: TokenParser<Tok, number> = (tokens) => {
  const t = tokens.first();
  if (t === undefined) return failure(notEnoughToken<Tok>(0));
  if (t.type !== "Digit") return failure(expects("digit", t));
  return success(tokens.advance(1), t.value);
};

function punct(type: Tok["type"], description: string): TokenParser<Tok, null> {
  return (tokens) => {
    const t = tokens.first();
    if (t === undefined) return failure(notEnoughToken<Tok>(0));
    if (t.type !== type) return failure(expects(description, t));
    return success(tokens.advance(1), null);
  };
}

export const comma = punct("Comma", "','");
export const lparen = punct("LParen", "'('");
export const rparen = punct("RParen", "')'");

/** A parser that always fails with `error`, whatever the input. */
export function failWith<O>(error: TokenParseError<Tok>): TokenParser<Tok, O> {
  return () => failure(error);
}

export function runOk<O>(parser: TokenParser<Tok, O>, tokens: Tok[]): { value: O; rest: Tok[] } {
  const r = parser(TokenSlice.of(tokens));
  if (!r.ok) throw new Error(`expected success, got ${formatParseError(r.error, describeTok)}`);
  return { value: r.value, rest: r.rest.toArray() };
}

export function runErr<O>(parser: TokenParser<Tok, O>, tokens: Tok[]): TokenParseError<Tok> {
  const r = parser(TokenSlice.of(tokens));
  if (r.ok) throw new Error(`expected failure, got ${JSON.stringify(r.value)}`);
  return r.error;
}
