/**
 * Shared CLI plumbing: global flags, config loading, stack lifetime and
 * error-to-exit-code mapping.
 */

import type { Command } from 'commander'
import {
  CompileFailureError,
  InvalidInputError,
  TemplateNotFoundError,
} from '../../core/errors.js'
import { createRenderStack, type RenderStack, type RenderStackOptions } from '../../core/bootstrap.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialTexsmithConfig, TexsmithConfig } from '../../modules/config/config-schema.js'
import { errorMessage } from '../../utils/helpers.js'

/** Exit codes shared by every command */
export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

/** Supported output formats */
export type OutputFormat = 'text' | 'json'

/**
 * Flags declared on the root program that shape configuration.
 */
export interface GlobalCliOptions {
  workDir?: string
  templateDir?: string
  compiler?: string
  projectConfigDir?: string
  globalConfigDir?: string
}

/**
 * Injection points for tests. Production callers pass nothing.
 */
export interface CommandDeps extends RenderStackOptions {
  /** Version reported in JSON output */
  version?: string
  /** Environment to read TEXSMITH_* overrides from */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// Option helpers
// ---------------------------------------------------------------------------

function stringOption(values: Record<string, unknown>, key: string): string | undefined {
  const value = values[key]
  return typeof value === 'string' && value !== '' ? value : undefined
}

/**
 * Collect the root program's flags as seen from a subcommand.
 */
export function readGlobalOptions(command: Command): GlobalCliOptions {
  const values: Record<string, unknown> = command.optsWithGlobals()
  const workDir = stringOption(values, 'workDir')
  const templateDir = stringOption(values, 'templateDir')
  const compiler = stringOption(values, 'compiler')
  const projectConfigDir = stringOption(values, 'projectConfigDir')
  const globalConfigDir = stringOption(values, 'globalConfigDir')
  return {
    ...(workDir !== undefined && { workDir }),
    ...(templateDir !== undefined && { templateDir }),
    ...(compiler !== undefined && { compiler }),
    ...(projectConfigDir !== undefined && { projectConfigDir }),
    ...(globalConfigDir !== undefined && { globalConfigDir }),
  }
}

export function parseOutputFormat(raw: string): OutputFormat {
  return raw === 'json' ? 'json' : 'text'
}

/**
 * Translate global flags into the highest-priority config layer.
 */
export function buildCliOverrides(opts: GlobalCliOptions): PartialTexsmithConfig {
  const global: NonNullable<PartialTexsmithConfig['global']> = {
    ...(opts.workDir !== undefined && { work_dir: opts.workDir }),
    ...(opts.templateDir !== undefined && { template_dir: opts.templateDir }),
  }
  const compiler: NonNullable<PartialTexsmithConfig['compiler']> = {
    ...(opts.compiler !== undefined && { binary: opts.compiler }),
  }
  return {
    ...(Object.keys(global).length > 0 && { global }),
    ...(Object.keys(compiler).length > 0 && { compiler }),
  }
}

// ---------------------------------------------------------------------------
// Config and stack
// ---------------------------------------------------------------------------

export async function loadCliConfig(
  opts: GlobalCliOptions,
  deps: CommandDeps = {},
): Promise<TexsmithConfig> {
  const configSystem = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(deps.env !== undefined && { env: deps.env }),
    cliOverrides: buildCliOverrides(opts),
  })
  await configSystem.load()
  return configSystem.getConfig()
}

/**
 * Build the render stack, hand it to `fn`, then shut it down.
 */
export async function withRenderStack<T>(
  opts: GlobalCliOptions,
  deps: CommandDeps,
  fn: (stack: RenderStack) => Promise<T>,
): Promise<T> {
  const config = await loadCliConfig(opts, deps)
  const stack = await createRenderStack(config, {
    ...(deps.cwd !== undefined && { cwd: deps.cwd }),
    ...(deps.availability !== undefined && { availability: deps.availability }),
    ...(deps.runner !== undefined && { runner: deps.runner }),
  })
  try {
    return await fn(stack)
  } finally {
    await stack.shutdown()
  }
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Map a failure to the process exit code.
 */
export function exitCodeForError(err: unknown): number {
  if (err instanceof TemplateNotFoundError || err instanceof InvalidInputError) {
    return EXIT_USAGE
  }
  return EXIT_FAILURE
}

/**
 * Write a failure to stderr and return its exit code.
 */
export function reportError(err: unknown): number {
  process.stderr.write(`Error: ${errorMessage(err)}\n`)
  if (err instanceof CompileFailureError && err.log !== '') {
    process.stderr.write(err.log.endsWith('\n') ? err.log : `${err.log}\n`)
  }
  return exitCodeForError(err)
}
