/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic overrides (the CLI passes its flags here)
 * 2. Environment variables: MONADPLAY_*
 * 3. Config files: .monadplayrc, .monadplayrc.json, monadplay.config.js, etc.
 * 4. package.json: "monadplay" key
 * 5. Defaults (lowest priority)
 *
 * @example Config file (.monadplayrc.json)
 * ```json
 * { "length": 1000, "numeric": "int32", "strict": true }
 * ```
 *
 * @example Environment
 * ```
 * MONADPLAY_LENGTH=50 MONADPLAY_NUMERIC=bigint MONADPLAY_VERBOSE=1 monadplay
 * ```
 */

import { cosmiconfigSync, type CosmiconfigResult } from "cosmiconfig";
import { NUMERIC_WIDTHS, type NumericWidth } from "../typeclasses/numeric.js";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export interface MonadplayConfig {
  /** Number of consecutive integers, starting at 0, to test with */
  readonly length: number;
  /** Integer width used by the arithmetic demonstration */
  readonly numeric: NumericWidth;
  /** Log what is being checked */
  readonly verbose: boolean;
  /** Exit with status 1 when any check fails */
  readonly strict: boolean;
}

export type ConfigKey = keyof MonadplayConfig;

export const DEFAULT_CONFIG: MonadplayConfig = {
  length: 100,
  numeric: "int64",
  verbose: false,
  strict: false,
};

const CONFIG_KEYS: readonly ConfigKey[] = ["length", "numeric", "verbose", "strict"];

/**
 * Unvalidated configuration, as read from a file or the environment.
 */
export type RawConfig = Partial<Record<ConfigKey, unknown>>;

export interface ResolvedConfig {
  readonly config: MonadplayConfig;
  /** Path of the config file that was loaded, if any */
  readonly filepath?: string;
}

export interface ResolveOptions {
  /** Directory to search for config files (default: process.cwd()) */
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: Partial<MonadplayConfig>;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "monadplay";

/**
 * Load configuration from the first config file found in `cwd`.
 */
export function loadConfigFromFiles(cwd: string): { config: RawConfig; filepath?: string } {
  let result: CosmiconfigResult;
  try {
    // The sync explorer has no loader for .mjs files
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });
    result = explorer.search(cwd);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load config file: ${reason}`, "file");
  }

  if (result === null || result.isEmpty) {
    return { config: {} };
  }
  if (!isRecord(result.config)) {
    throw new ConfigError(`Config in ${result.filepath} must be an object`, "file");
  }
  return { config: pickKnownKeys(result.config), filepath: result.filepath };
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "MONADPLAY_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   MONADPLAY_LENGTH=50       → { length: "50" }
 *   MONADPLAY_STRICT=1        → { strict: "1" }
 *
 * Values stay strings here; `validateConfig` parses them per key.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || value === undefined) continue;
    raw[name.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }
  return pickKnownKeys(raw);
}

// ============================================================================
// Validation
// ============================================================================

function parseBoolean(key: ConfigKey, value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  throw new ConfigError(`${key} must be a boolean, got ${JSON.stringify(value)}`, key);
}

function parseLength(value: unknown): number {
  const n = typeof value === "string" && /^\d+$/.test(value) ? parseInt(value, 10) : value;
  if (typeof n !== "number" || !Number.isSafeInteger(n) || n < 0) {
    throw new ConfigError(
      `length must be a non-negative integer, got ${JSON.stringify(value)}`,
      "length",
    );
  }
  return n;
}

function parseNumericWidth(value: unknown): NumericWidth {
  const width = NUMERIC_WIDTHS.find((w) => w === value);
  if (width === undefined) {
    throw new ConfigError(
      `numeric must be one of ${NUMERIC_WIDTHS.join(", ")}, got ${JSON.stringify(value)}`,
      "numeric",
    );
  }
  return width;
}

/**
 * Validate raw values, filling in defaults for missing keys.
 *
 * @throws ConfigError naming the first invalid key
 */
export function validateConfig(raw: RawConfig): MonadplayConfig {
  return {
    length: raw.length === undefined ? DEFAULT_CONFIG.length : parseLength(raw.length),
    numeric: raw.numeric === undefined ? DEFAULT_CONFIG.numeric : parseNumericWidth(raw.numeric),
    verbose: raw.verbose === undefined ? DEFAULT_CONFIG.verbose : parseBoolean("verbose", raw.verbose),
    strict: raw.strict === undefined ? DEFAULT_CONFIG.strict : parseBoolean("strict", raw.strict),
  };
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Merge every configuration source and validate the result.
 * Priority: overrides > env vars > config files > defaults
 */
export function resolveConfig(options: ResolveOptions = {}): ResolvedConfig {
  const file = loadConfigFromFiles(options.cwd ?? process.cwd());
  const env = loadConfigFromEnv(options.env ?? process.env);

  const merged: RawConfig = {
    ...file.config,
    ...env,
    ...definedOnly(options.overrides ?? {}),
  };

  return { config: validateConfig(merged), filepath: file.filepath };
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickKnownKeys(source: Record<string, unknown>): RawConfig {
  const raw: RawConfig = {};
  for (const key of CONFIG_KEYS) {
    if (source[key] !== undefined) {
      raw[key] = source[key];
    }
  }
  return raw;
}

function definedOnly(values: Partial<MonadplayConfig>): RawConfig {
  return pickKnownKeys({ ...values });
}
