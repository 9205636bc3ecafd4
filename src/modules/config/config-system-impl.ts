/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.texsmith/config.yaml)
 *     → project config      (./.texsmith/config.yaml)
 *     → environment vars    (TEXSMITH_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir } from 'fs/promises'
import { delimiter, join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { fileExists, isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  TexsmithConfigSchema,
  PartialTexsmithConfigSchema,
  type TexsmithConfig,
  type PartialTexsmithConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

/** Name of the config file inside a config directory */
export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/**
 * Merge `override` into a copy of `base`. Nested plain objects merge
 * recursively; arrays and scalars replace. Undefined values are skipped.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

type EnvValueKind = 'string' | 'int' | 'paths'

/**
 * Map of TEXSMITH_ environment variable names to config paths.
 */
const ENV_VAR_MAP: Record<string, { path: string; kind: EnvValueKind }> = {
  TEXSMITH_LOG_LEVEL: { path: 'global.log_level', kind: 'string' },
  TEXSMITH_WORK_DIR: { path: 'global.work_dir', kind: 'string' },
  TEXSMITH_TEMPLATE_DIR: { path: 'global.template_dir', kind: 'string' },
  TEXSMITH_MAX_CONCURRENT_RENDERS: { path: 'global.max_concurrent_renders', kind: 'int' },
  TEXSMITH_COMPILER: { path: 'compiler.binary', kind: 'string' },
  TEXSMITH_TEX_INPUTS: { path: 'compiler.tex_inputs', kind: 'paths' },
  TEXSMITH_DEFAULT_RUNS: { path: 'compiler.default_runs', kind: 'int' },
  TEXSMITH_COMPILER_TIMEOUT_MS: { path: 'compiler.timeout_ms', kind: 'int' },
}

function coerceEnvValue(raw: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case 'int':
      return /^\d+$/.test(raw) ? parseInt(raw, 10) : raw
    case 'paths':
      return raw.split(delimiter).filter((entry) => entry !== '')
    case 'string':
      return raw
  }
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid values are logged and ignored.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialTexsmithConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, { path, kind }] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = setByPath(overrides, path, coerceEnvValue(rawValue, kind))
  }

  const parsed = PartialTexsmithConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined) return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const existing = obj[head]
  const child = isPlainObject(existing) ? existing : {}
  return { ...obj, [head]: setByPath(child, rest.join('.'), value) }
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: TexsmithConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialTexsmithConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.texsmith')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.texsmith')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Global user config, then 3. project config
    for (const dir of [this._globalConfigDir, this._projectConfigDir]) {
      const fileConfig = await this._loadYamlFile(join(dir, CONFIG_FILE_NAME))
      if (fileConfig !== null) {
        merged = deepMerge(merged, fileConfig)
      }
    }

    // 4. Environment variable overrides
    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) {
      merged = deepMerge(merged, envOverrides)
    }

    // 5. CLI flag overrides
    if (Object.keys(this._cliOverrides).length > 0) {
      merged = deepMerge(merged, this._cliOverrides)
    }

    // 6. Validate the merged config
    const result = TexsmithConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): TexsmithConfig {
    if (this._config === null) {
      throw new ConfigError(
        'Configuration has not been loaded. Call load() before getConfig().',
        {}
      )
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    if (existing === undefined) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }

    // Whole sections and lists are edited in the file itself
    if (typeof existing === 'object' && existing !== null) {
      throw new ConfigError(
        `Cannot set object key "${key}"; use a more specific dot-notation path`,
        { key }
      )
    }

    const projectConfigPath = join(this._projectConfigDir, CONFIG_FILE_NAME)
    const projectConfigRaw: Record<string, unknown> =
      (await this._loadYamlFile(projectConfigPath)) ?? {}

    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialTexsmithConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(
        `Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`,
        { key, value, issues: partial.error.issues }
      )
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(updated), 'utf-8')

    await this.load()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialTexsmithConfig | null> {
    if (!(await fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(
        `Failed to read config file at ${filePath}: ${message}`,
        { filePath }
      )
    }

    // An empty file parses to undefined; treat it as "no overrides".
    if (parsed === undefined || parsed === null) return {}

    const result = PartialTexsmithConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }

    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
