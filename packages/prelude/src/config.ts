/**
 * Prelude Configuration
 *
 * Configuration is resolved from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: ADT_PRELUDE_*
 * 3. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@adt-prelude/prelude";
 *
 * config.get("debug");          // → false
 * config.get("show.maxLength"); // → 200
 *
 * config.set({ show: { maxLength: 40 } });
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Rendering options for payloads shown in messages and `toString()`.
 */
export interface ShowConfig {
  /** Longest rendering kept intact; longer ones are cut. 0 disables the cut. */
  maxLength?: number;
}

/**
 * Full prelude configuration schema.
 */
export interface PreludeConfig {
  /** Trace wrapError classification through console.debug */
  debug?: boolean;
  show?: ShowConfig;
}

/**
 * Configuration with every default filled in.
 */
export interface ResolvedPreludeConfig {
  readonly debug: boolean;
  readonly show: { readonly maxLength: number };
}

export type ConfigPath = "debug" | "show.maxLength";

const ENV_PREFIX = "ADT_PRELUDE_";

const DEFAULTS: ResolvedPreludeConfig = {
  debug: false,
  show: { maxLength: 200 },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: ResolvedPreludeConfig = DEFAULTS;
let configLoaded = false;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   ADT_PRELUDE_DEBUG=1                  → { debug: true }
 *   ADT_PRELUDE_SHOW__MAX_LENGTH=80      → { show: { maxLength: 80 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): PreludeConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // Double underscore nests, single underscore joins words in camelCase
    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase()));

    setNestedValue(raw, configPath, parseEnvValue(value));
  }

  return toPreludeConfig(raw);
}

function parseEnvValue(value: string): unknown {
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (value === "true") return true;
  if (value === "false" || value === "") return false;
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value along a path of keys.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj;

  for (const part of path.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[path[path.length - 1]] = value;
}

/**
 * Keep the known keys of a raw object whose values have the right shape.
 */
function toPreludeConfig(raw: Record<string, unknown>): PreludeConfig {
  const result: PreludeConfig = {};

  if (typeof raw.debug === "boolean") {
    result.debug = raw.debug;
  } else if (typeof raw.debug === "number") {
    result.debug = raw.debug !== 0;
  }

  const show = raw.show;
  if (isRecord(show) && typeof show.maxLength === "number") {
    result.show = { maxLength: show.maxLength };
  }

  return result;
}

function merge(base: ResolvedPreludeConfig, values: PreludeConfig): ResolvedPreludeConfig {
  return {
    debug: values.debug ?? base.debug,
    show: {
      maxLength: values.show?.maxLength ?? base.show.maxLength,
    },
  };
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;
  configStore = merge(DEFAULTS, loadConfigFromEnv(process.env));
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: "debug"): boolean;
function get(path: "show.maxLength"): number;
function get(path: ConfigPath): boolean | number {
  initializeConfig();
  switch (path) {
    case "debug":
      return configStore.debug;
    case "show.maxLength":
      return configStore.show.maxLength;
  }
}

/**
 * Set configuration values programmatically.
 */
function set(values: PreludeConfig): void {
  initializeConfig();
  configStore = merge(configStore, values);
}

/**
 * Get all configuration values.
 */
function getAll(): ResolvedPreludeConfig {
  initializeConfig();
  return configStore;
}

/**
 * Forget programmatic values; the environment is read again on next access.
 */
function reset(): void {
  configStore = DEFAULTS;
  configLoaded = false;
}

export const config = {
  get,
  set,
  getAll,
  reset,
};
