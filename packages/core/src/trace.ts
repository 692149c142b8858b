import { getConfig } from "./config.js";
import { formatParseError } from "./errors.js";
import type { TokenParser } from "./types.js";

export interface TraceOptions<T> {
  /** Force tracing on or off; defaults to the `trace` config value. */
  enabled?: boolean;
  /** Line sink (default: console.error). */
  writer?: (line: string) => void;
  /** Rendering of tokens in failure lines. */
  describeToken?: (token: T) => string;
}

const PREFIX = "[token-combinator]";

/**
 * Log each call of `parser`: the input length on entry, then the number of
 * tokens consumed or the rendered error. Results are passed through as-is.
 */
export function trace<T, O, W>(
  label: string,
  parser: TokenParser<T, O, W>,
  options: TraceOptions<T> = {}
): TokenParser<T, O, W> {
  return (tokens) => {
    if (!(options.enabled ?? getConfig().trace)) return parser(tokens);

    const writer = options.writer ?? ((line: string) => console.error(line));
    const n = tokens.length;
    writer(`${PREFIX} ${label}: enter with ${n} token${n === 1 ? "" : "s"}`);
    const r = parser(tokens);
    if (r.ok) {
      writer(`${PREFIX} ${label}: ok, consumed ${r.rest.consumedSince(tokens)}`);
    } else {
      writer(`${PREFIX} ${label}: failed, ${formatParseError(r.error, options.describeToken)}`);
    }
    return r;
  };
}
