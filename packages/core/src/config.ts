/**
 * Configuration
 *
 * Resolved from (highest priority first):
 *
 * 1. Environment variable: TOKEN_COMBINATOR_TRACE
 * 2. Programmatic: configure() calls
 * 3. Config files: .tokencombinatorrc, .tokencombinatorrc.json/.yaml/.yml,
 *    or the "tokencombinator" key of package.json
 * 4. Defaults
 *
 * @example
 * ```typescript
 * // .tokencombinatorrc.json
 * { "trace": true }
 *
 * // or for a single run
 * TOKEN_COMBINATOR_TRACE=1 npm test
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

export interface TokenCombinatorConfig {
  /** Log every call of parsers wrapped with `trace()`. */
  trace: boolean;
}

export interface ResolveConfigOptions {
  /** Directory to look for config files in (default: process.cwd()). */
  searchFrom?: string;
  /** Environment to read overrides from (default: process.env). */
  env?: NodeJS.ProcessEnv;
}

const MODULE_NAME = "tokencombinator";
const TRACE_ENV = "TOKEN_COMBINATOR_TRACE";

const DEFAULTS: TokenCombinatorConfig = { trace: false };

let overrides: Partial<TokenCombinatorConfig> = {};
let cached: TokenCombinatorConfig | undefined;

// ============================================================================
// Sources
// ============================================================================

function loadConfigFromFiles(searchFrom: string | undefined): Partial<TokenCombinatorConfig> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
    ],
  });

  const result = explorer.search(searchFrom);
  if (!result || result.isEmpty) return {};

  const raw: unknown = result.config;
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${result.filepath}: expected an object`);
  }
  const config: Partial<TokenCombinatorConfig> = {};
  if ("trace" in raw) {
    if (typeof raw.trace !== "boolean") {
      throw new ConfigError(`${result.filepath}: "trace" must be a boolean`);
    }
    config.trace = raw.trace;
  }
  return config;
}

function loadConfigFromEnv(env: NodeJS.ProcessEnv): Partial<TokenCombinatorConfig> {
  const value = env[TRACE_ENV];
  if (value === undefined) return {};
  if (value === "1" || value === "true") return { trace: true };
  if (value === "0" || value === "false" || value === "") return { trace: false };
  throw new ConfigError(`${TRACE_ENV} must be one of 1, 0, true, false (got "${value}")`);
}

// ============================================================================
// Public API
// ============================================================================

/** Resolve the configuration from scratch, bypassing the cache. */
export function resolveConfig(options: ResolveConfigOptions = {}): TokenCombinatorConfig {
  return {
    ...DEFAULTS,
    ...loadConfigFromFiles(options.searchFrom),
    ...overrides,
    ...loadConfigFromEnv(options.env ?? process.env),
  };
}

/** The resolved configuration, loaded on first use. */
export function getConfig(): TokenCombinatorConfig {
  if (!cached) cached = resolveConfig();
  return cached;
}

/** Override configuration values programmatically. */
export function configure(partial: Partial<TokenCombinatorConfig>): void {
  overrides = { ...overrides, ...partial };
  cached = undefined;
}

/** Drop programmatic overrides and the cached configuration. */
export function resetConfig(): void {
  overrides = {};
  cached = undefined;
}
