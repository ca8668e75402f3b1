/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the strata packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: STRATA_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: .stratarc, .stratarc.json, package.json#strata, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@strata/core";
 *
 * config.get("rewrite.limit")   // → 10000
 * config.set({ render: { indent: 4 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

import { StrataError, S1201 } from "./diagnostics.js";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Limits for repeated layer rewrites.
 */
export interface RewriteConfig {
  /** Maximum number of rewrite steps before `repeatedly` gives up */
  limit?: number;
}

/**
 * Render-tree formatting.
 */
export interface RenderConfig {
  /** Spaces per nesting level */
  indent?: number;
}

/**
 * Property-test settings used by `@strata/testing`.
 */
export interface LawsConfig {
  /** Number of generated cases per property */
  runs?: number;
  /** Base seed; case i uses `seed + i` */
  seed?: number;
}

/**
 * Full strata configuration schema.
 */
export interface StrataConfig {
  /** Enable debug logging */
  debug?: boolean;
  rewrite?: RewriteConfig;
  render?: RenderConfig;
  laws?: LawsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

type ConfigRecord = Record<string, unknown>;

let configStore: ConfigRecord = {};
let overrides: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "strata";
const ENV_PREFIX = "STRATA_";

const DEFAULTS: StrataConfig = {
  debug: false,
  rewrite: { limit: 10000 },
  render: { indent: 2 },
  laws: { runs: 100, seed: 0 },
};

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   STRATA_DEBUG=1            → { debug: true }
 *   STRATA_LAWS_RUNS=250      → { laws: { runs: 250 } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(configPath, value));
  }

  return envConfig;
}

/**
 * Coerce by the type of the key's default: numeric keys take integers,
 * boolean keys take 1/0/true/false. Other keys read digits as numbers,
 * then 1/0/true/false as flags.
 */
function parseEnvValue(path: string, value: string): unknown {
  const fallback = getNestedValue(DEFAULTS, path);
  const integer = /^-?\d+$/.test(value) ? parseInt(value, 10) : undefined;
  const flag =
    value === "1" || value === "true" ? true : value === "0" || value === "false" || value === "" ? false : undefined;

  if (typeof fallback === "number") return integer ?? value;
  if (typeof fallback === "boolean") return flag ?? value;
  return integer ?? flag ?? value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

interface FileLoadResult {
  readonly config: ConfigRecord;
  readonly problem?: string;
}

function loadConfigFromFiles(): FileLoadResult {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  try {
    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return { config: result.config };
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { config: {}, problem: message };
  }
  return { config: {} };
}

// ============================================================================
// Validation
// ============================================================================

// Smallest accepted value per integer key
const INTEGER_MINIMUMS = [
  ["rewrite.limit", 1],
  ["render.indent", 0],
  ["laws.runs", 0],
] as const;

function validate(candidate: ConfigRecord): void {
  for (const [key, min] of INTEGER_MINIMUMS) {
    const value = getNestedValue(candidate, key);
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
      const expected = min === 0 ? "a non-negative integer" : `an integer of at least ${min}`;
      throw new StrataError(S1201, { key, value: String(value), expected });
    }
  }
  const seed = getNestedValue(candidate, "laws.seed");
  if (seed !== undefined && (typeof seed !== "number" || !Number.isInteger(seed))) {
    throw new StrataError(S1201, { key: "laws.seed", value: String(seed), expected: "an integer" });
  }
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileResult = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < file < programmatic < env
  const merged = deepMerge(deepMerge(deepMerge(DEFAULTS, fileResult.config), overrides), envConfig);
  validate(merged);
  configStore = merged;
  configLoaded = true;

  // The logger reads `debug` from this store, so report only once it is loaded.
  const log = createLogger("config");
  if (fileResult.problem !== undefined) {
    log.warn(`ignoring unreadable config file: ${fileResult.problem}`);
  } else if (configFilePath !== undefined) {
    log.debug(`loaded ${configFilePath}`);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Get a numeric configuration value, falling back when unset.
 */
function getNumber(path: string, fallback: number): number {
  const value = get(path);
  return typeof value === "number" ? value : fallback;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<StrataConfig>): void {
  initializeConfig();
  const next = deepMerge(configStore, values);
  validate(next);
  overrides = deepMerge(overrides, values);
  configStore = deepMerge(next, loadConfigFromEnv());
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<ConfigRecord> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  getNumber,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};
