/**
 * @token-combinator/core
 *
 * Parser combinators over pre-tokenized input.
 *
 * Provides:
 * - A zero-copy token slice and the parser call contract
 * - An error model that records how far a parse got
 * - opt / many0 / many1 / tuple / delimited / separatedList0 / separatedList1 / alt / map
 * - context, lazy and trace helpers, plus parse / parseAll entry points
 *
 * @module
 */

// Core types
export type { TokenParseErrorKind, TokenParseError, ParseResult, TokenParser, ToToken } from "./types.js";
export { TokenSlice } from "./slice.js";

// Errors
export {
  expects,
  notEnoughToken,
  withTokensConsumed,
  withContext,
  mergeErrors,
  formatParseError,
  TokenCombinatorError,
  TokenParseFailure,
  TrailingTokensError,
  ConfigError,
} from "./errors.js";

// Combinator API
export type { AnyTokenParser, OutputOf, OutputsOf, TokenOf, WrapperOf } from "./combinators.js";
export {
  success,
  failure,
  opt,
  many0,
  many1,
  tuple,
  delimited,
  separatedList0,
  separatedList1,
  alt,
  map,
  context,
  lazy,
} from "./combinators.js";

// Running
export type { ParseAllOptions } from "./run.js";
export { parse, parseAll } from "./run.js";

// Configuration and tracing
export type { TokenCombinatorConfig, ResolveConfigOptions } from "./config.js";
export { getConfig, resolveConfig, configure, resetConfig } from "./config.js";
export type { TraceOptions } from "./trace.js";
export { trace } from "./trace.js";
