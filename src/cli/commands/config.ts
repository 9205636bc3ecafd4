/**
 * `texsmith config` command group
 *
 * Subcommands:
 *   - `texsmith config show`               display the merged config
 *   - `texsmith config get <key>`          print one value by dot-notation key
 *   - `texsmith config set <key> <value>`  update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { ConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import { buildCliOverrides, readGlobalOptions, type GlobalCliOptions } from '../utils/stack.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

export interface ConfigCommandOptions extends GlobalCliOptions {
  /** Environment to read TEXSMITH_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// Coerce string value to appropriate JS type
// ---------------------------------------------------------------------------

export function coerceValue(raw: string): unknown {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (trimmed === 'null') return null
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return trimmed
}

/**
 * Create and load a ConfigSystem, reporting failures on stderr.
 * Returns the exit code instead of a system when loading fails.
 */
async function loadSystem(opts: ConfigCommandOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
    cliOverrides: buildCliOverrides(opts),
  })

  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigCommandOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const config = system.getConfig()
  if ((opts.format ?? 'yaml') === 'json') {
    process.stdout.write(JSON.stringify(config, null, 2) + '\n')
  } else {
    process.stdout.write('# texsmith configuration\n\n')
    process.stdout.write(yaml.dump(config))
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigCommandOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = system.get(key)
  if (value === undefined) {
    process.stderr.write(`  Error: Unknown config key: ${key}\n`)
    return CONFIG_EXIT_INVALID
  }

  process.stdout.write(
    (typeof value === 'string' ? value : JSON.stringify(value)) + '\n'
  )
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(
  key: string,
  rawValue: string,
  opts: ConfigCommandOptions = {}
): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = coerceValue(rawValue)
  try {
    await system.set(key, value)
    process.stdout.write(`  Set ${key} = ${JSON.stringify(value)}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    process.stderr.write(`  Error updating configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command, _version: string): void {
  const configCmd = program
    .command('config')
    .description('View and modify texsmith configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .action(async (opts: { format: string }, command: Command) => {
      const exitCode = await runConfigShow({
        ...readGlobalOptions(command),
        format: opts.format === 'json' ? 'json' : 'yaml',
      })
      process.exitCode = exitCode
    })

  configCmd
    .command('get <key>')
    .description('Print one configuration value (e.g. compiler.binary)')
    .action(async (key: string, _opts: unknown, command: Command) => {
      const exitCode = await runConfigGet(key, readGlobalOptions(command))
      process.exitCode = exitCode
    })

  configCmd
    .command('set <key> <value>')
    .description(
      'Set a configuration value using dot-notation (e.g. compiler.default_runs 2)'
    )
    .action(async (key: string, value: string, _opts: unknown, command: Command) => {
      const exitCode = await runConfigSet(key, value, readGlobalOptions(command))
      process.exitCode = exitCode
    })
}
