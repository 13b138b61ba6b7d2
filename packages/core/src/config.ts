/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: POLYEQ_* (highest priority, for CI overrides)
 * 2. Config files: `polyeq` key in package.json, .polyeqrc, polyeq.config.cjs, ...
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@polyeq/core";
 *
 * config.get("eq.box")                 // → true
 * config.set({ eq: { box: false } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the `eqInterface` expansion.
 */
export interface EqExpansionConfig {
  /** Also emit comparisons for `Box<Interface>` owning wrappers */
  box?: boolean;
  /** Module the generated code imports the runtime from */
  runtimeModule?: string;
  /** Namespace alias the generated code uses for that import */
  runtimeAlias?: string;
}

/**
 * Full polyeq configuration schema.
 */
export interface PolyeqConfig {
  /** Log every expansion the transformer performs */
  verbose?: boolean;
  /** Expansion options */
  eq?: EqExpansionConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

export const DEFAULT_CONFIG: Readonly<PolyeqConfig> = {
  verbose: false,
  eq: {
    box: true,
    runtimeModule: "@polyeq/eq",
    runtimeAlias: "__polyeq",
  },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: PolyeqConfig = {};
let configLoaded = false;

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
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
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
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "POLYEQ_";

/**
 * Parse POLYEQ_* variables into a config object.
 *
 * Examples:
 *   POLYEQ_VERBOSE=1                 → { verbose: true }
 *   POLYEQ_EQ_BOX=0                  → { eq: { box: false } }
 *   POLYEQ_EQ_RUNTIME__MODULE=my-eq  → { eq: { runtimeModule: "my-eq" } }
 *
 * A single underscore separates path segments; a double underscore joins
 * the two words around it in camelCase.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PolyeqConfig {
  const envConfig: PolyeqConfig = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__([a-z])/g, (_, ch: string) => ch.toUpperCase())
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "polyeq";

function loadConfigFromFiles(): PolyeqConfig {
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
  const result = explorer.search();
  if (result && !result.isEmpty && isRecord(result.config)) {
    return result.config as PolyeqConfig;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(
    deepMerge({ ...DEFAULT_CONFIG }, loadConfigFromFiles()),
    loadConfigFromEnv()
  ) as PolyeqConfig;
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path. The caller names the expected type;
 * values from files and the environment are not validated against it.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  return getNestedValue(configStore, path) as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<PolyeqConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values) as PolyeqConfig;
}

/**
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  reset,
} as const;
