/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * Callers depend on this interface; create an instance via
 * `createConfigSystem()` from config-system-impl.ts.
 */

import type { TexsmithConfig, PartialTexsmithConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Project-level config directory (default: <cwd>/.texsmith) */
  projectConfigDir?: string
  /** User-level config directory (default: ~/.texsmith) */
  globalConfigDir?: string
  /** Values that override everything, typically from CLI flags */
  cliOverrides?: PartialTexsmithConfig
  /** Environment to read TEXSMITH_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): TexsmithConfig

  /**
   * Return a single value by dot-notation key (e.g. "compiler.binary").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Write one scalar value into the project config file and reload.
   * @throws {ConfigError} for unknown keys, section keys or invalid values.
   */
  set(key: string, value: unknown): Promise<void>

  readonly isLoaded: boolean
}
