/**
 * @token-combinator/derive
 *
 * Leaf parsers for @token-combinator/core: parsers that match a single token
 * kind and fail with a descriptive `expects` error otherwise.
 *
 * @module
 */

export type { NoMatch, Selector } from "./leaf.js";
export { noMatch, leaf, wrappedLeaf } from "./leaf.js";

export type { Variant, DeriveOptions } from "./derive.js";
export { TokenParsers, deriveTokenParsers, deriveWrappedTokenParsers } from "./derive.js";
