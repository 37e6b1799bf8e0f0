/**
 * Configuration loading
 *
 * Settings are read from (highest priority first):
 *
 * 1. Environment variables: `UNITVEC_TOLERANCE`, `UNITVEC_INTEROP`
 * 2. Config files: `.unitvecrc`, `.unitvecrc.json`, `.unitvecrc.yaml`,
 *    `unitvec.config.js`, ...
 * 3. package.json: `"unitvec"` key
 * 4. Defaults from `@unitvec/types`
 *
 * @example Config file (unitvec.config.mjs)
 * ```typescript
 * import { defineConfig } from "@unitvec/config";
 *
 * export default defineConfig({
 *   tolerance: 1e-6,
 *   interop: { three: true },
 * });
 * ```
 */

import { cosmiconfig } from "cosmiconfig";
import { configure, getSettings, type Settings } from "@unitvec/types";
import type { ZodIssue } from "zod";
import { INTEROP_LIBRARIES, UnitvecConfig, type InteropLibrary } from "./schema.js";

// ============================================================================
// Errors
// ============================================================================

/** A config file or environment value could not be read or is invalid */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Types
// ============================================================================

export type Environment = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** Directory to look for config files in. Defaults to `process.cwd()`. */
  searchFrom?: string;
  /** Environment to read overrides from. Defaults to `process.env`. */
  env?: Environment;
}

export interface LoadedConfig {
  readonly config: UnitvecConfig;
  /** The file the config came from, if any */
  readonly filepath?: string;
}

/** Identity helper that type-checks a config file's default export */
export function defineConfig(config: UnitvecConfig): UnitvecConfig {
  return config;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "unitvec";

const SEARCH_PLACES = [
  "package.json",
  `.${MODULE_NAME}rc`,
  `.${MODULE_NAME}rc.json`,
  `.${MODULE_NAME}rc.yaml`,
  `.${MODULE_NAME}rc.yml`,
  `${MODULE_NAME}.config.js`,
  `${MODULE_NAME}.config.cjs`,
  `${MODULE_NAME}.config.mjs`,
];

function formatIssues(issues: readonly ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`).join("; ");
}

async function loadFromFiles(searchFrom: string): Promise<LoadedConfig> {
  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: SEARCH_PLACES,
    ignoreEmptySearchPlaces: false,
  });

  const result = await explorer.search(searchFrom).catch((error: unknown) => {
    throw new ConfigError(`Failed to load ${MODULE_NAME} config: ${String(error)}`, { cause: error });
  });

  if (result === null) return { config: {} };
  if (result.isEmpty) {
    console.warn(`[${MODULE_NAME}] Ignoring empty config file ${result.filepath}`);
    return { config: {}, filepath: result.filepath };
  }

  const parsed = UnitvecConfig.safeParse(result.config);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config in ${result.filepath}: ${formatIssues(parsed.error.issues)}`, {
      cause: parsed.error,
    });
  }
  return { config: parsed.data, filepath: result.filepath };
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Read overrides from the environment.
 *
 *   UNITVEC_TOLERANCE=1e-6           → { tolerance: 1e-6 }
 *   UNITVEC_INTEROP=three,gl-matrix  → { interop: { three: true, "gl-matrix": true } }
 *
 * `UNITVEC_INTEROP` replaces the whole interop section: libraries it does
 * not list are disabled, and an empty value disables them all.
 */
export function loadConfigFromEnv(env: Environment): UnitvecConfig {
  const config: { tolerance?: number; interop?: Partial<Record<InteropLibrary, boolean>> } = {};

  const tolerance = env.UNITVEC_TOLERANCE;
  if (tolerance !== undefined && tolerance.trim() !== "") {
    const value = Number(tolerance);
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError(`UNITVEC_TOLERANCE must be a finite positive number, got "${tolerance}"`);
    }
    config.tolerance = value;
  }

  const interop = env.UNITVEC_INTEROP;
  if (interop !== undefined) {
    const listed = interop
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name !== "");
    const unknown = listed.filter((name) => !isInteropLibrary(name));
    if (unknown.length > 0) {
      throw new ConfigError(
        `UNITVEC_INTEROP lists unknown libraries: ${unknown.join(", ")} (expected ${INTEROP_LIBRARIES.join(", ")})`
      );
    }
    config.interop = Object.fromEntries(INTEROP_LIBRARIES.map((lib) => [lib, listed.includes(lib)]));
  }

  return config;
}

function isInteropLibrary(name: string): name is InteropLibrary {
  return INTEROP_LIBRARIES.some((lib) => lib === name);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Find, validate and merge configuration. Environment values override
 * file values.
 *
 * @throws ConfigError on an unreadable or invalid file or environment value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const fromFile = await loadFromFiles(options.searchFrom ?? process.cwd());
  const fromEnv = loadConfigFromEnv(options.env ?? process.env);
  return {
    config: { ...fromFile.config, ...fromEnv },
    filepath: fromFile.filepath,
  };
}

/** Push loaded values into the `@unitvec/types` settings */
export function applyConfig(config: UnitvecConfig): Settings {
  if (config.tolerance !== undefined) {
    return configure({ tolerance: config.tolerance });
  }
  return getSettings();
}

/** Libraries the config enables, in a fixed order */
export function enabledInterop(config: UnitvecConfig): InteropLibrary[] {
  return INTEROP_LIBRARIES.filter((lib) => config.interop?.[lib] === true);
}
