/**
 * Derive leaf parsers from a tagged-union token type.
 *
 * Instead of generating one function per token variant ahead of time, the
 * dispatcher reads the variant tag at parse time:
 *
 * @example
 * ```typescript
 * type Tok =
 *   | { type: "Digit"; value: number }
 *   | { type: "Comma" };
 *
 * const tokens = deriveTokenParsers<Tok, "type">("type");
 * const digit = tokens.parser("Digit", (t) => t.value); // TokenParser<Tok, number>
 * const comma = tokens.parser("Comma");                 // TokenParser<Tok, { type: "Comma" }>
 * ```
 */

import type { ToToken, TokenParser } from "@token-combinator/core";
import { noMatch, wrappedLeaf } from "./leaf.js";

/** The member of `T` whose discriminant `D` equals `K`. */
export type Variant<T, D extends keyof T, K extends T[D]> = Extract<T, Record<D, K>>;

export interface DeriveOptions<T, D extends keyof T> {
  /** Description used in `expects` errors (default: the kind itself). */
  describe?: (kind: T[D]) => string;
}

/** Builds and caches leaf parsers for the variants of `T`, keyed on `T[D]`. */
export class TokenParsers<T, D extends keyof T, W = T> {
  private readonly cache = new Map<T[D], TokenParser<T, unknown, W>>();

  constructor(
    readonly discriminant: D,
    private readonly toToken: ToToken<W, T>,
    private readonly options: DeriveOptions<T, D> = {}
  ) {}

  /** Leaf matching tokens of `kind`; outputs the narrowed token. */
  parser<K extends T[D]>(kind: K): TokenParser<T, Variant<T, D, K>, W>;
  /** Leaf matching tokens of `kind`; outputs `extract` of the narrowed token. */
  parser<K extends T[D], O>(kind: K, extract: (token: Variant<T, D, K>, wrapper: W) => O): TokenParser<T, O, W>;
  parser<K extends T[D], O>(
    kind: K,
    extract?: (token: Variant<T, D, K>, wrapper: W) => O
  ): TokenParser<T, unknown, W> {
    if (extract) return this.build(kind, extract);

    const hit = this.cache.get(kind);
    if (hit) return hit;
    const built = this.build(kind, (token) => token);
    this.cache.set(kind, built);
    return built;
  }

  /** Description used in `expects` errors for `kind`. */
  describe(kind: T[D]): string {
    return this.options.describe?.(kind) ?? String(kind);
  }

  private build<K extends T[D], O>(
    kind: K,
    extract: (token: Variant<T, D, K>, wrapper: W) => O
  ): TokenParser<T, O, W> {
    const discriminant = this.discriminant;
    const isKind = (token: T): token is Variant<T, D, K> => token[discriminant] === kind;
    return wrappedLeaf(
      this.describe(kind),
      (token: T, wrapper: W) => (isKind(token) ? extract(token, wrapper) : noMatch),
      this.toToken
    );
  }
}

/** Dispatcher over inputs whose elements are the tokens themselves. */
export function deriveTokenParsers<T, D extends keyof T>(
  discriminant: D,
  options?: DeriveOptions<T, D>
): TokenParsers<T, D> {
  return new TokenParsers<T, D>(discriminant, (token) => token, options);
}

/** Dispatcher over wrapped inputs; `toToken` recovers the tagged token. */
export function deriveWrappedTokenParsers<T, D extends keyof T, W>(
  discriminant: D,
  toToken: ToToken<W, T>,
  options?: DeriveOptions<T, D>
): TokenParsers<T, D, W> {
  return new TokenParsers<T, D, W>(discriminant, toToken, options);
}
