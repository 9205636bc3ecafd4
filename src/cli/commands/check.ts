/**
 * `texsmith check` command
 *
 * Probes the configured compiler the same way the render stack does at
 * startup and reports whether it resolves on PATH.
 */

import type { Command } from 'commander'
import { createCompilerInvoker } from '../../modules/renderer/compiler-invoker.js'
import { buildJsonOutput } from '../utils/formatting.js'
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  loadCliConfig,
  parseOutputFormat,
  readGlobalOptions,
  reportError,
  type CommandDeps,
  type GlobalCliOptions,
  type OutputFormat,
} from '../utils/stack.js'

export interface CheckCliOptions extends GlobalCliOptions {
  outputFormat: OutputFormat
}

/**
 * Exit 0 when the compiler resolves, 1 when it does not.
 */
export async function runCheckAction(
  opts: CheckCliOptions,
  deps: CommandDeps = {},
): Promise<number> {
  try {
    const config = await loadCliConfig(opts, deps)
    const invoker = await createCompilerInvoker({
      binary: config.compiler.binary,
      ...(deps.runner !== undefined && { runner: deps.runner }),
    })
    const { available, resolvedPath } = invoker.availability

    if (opts.outputFormat === 'json') {
      const data = {
        binary: invoker.binary,
        available,
        ...(resolvedPath !== undefined && { resolvedPath }),
      }
      const output = buildJsonOutput('texsmith check', data, deps.version ?? '0.0.0')
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    } else if (available) {
      process.stdout.write(`${invoker.binary}: available (${resolvedPath ?? invoker.binary})\n`)
    } else {
      process.stdout.write(`${invoker.binary}: not found on PATH; renders will return .tex only\n`)
    }

    return available ? EXIT_SUCCESS : EXIT_FAILURE
  } catch (err) {
    return reportError(err)
  }
}

export function registerCheckCommand(program: Command, version: string): void {
  program
    .command('check')
    .description('Check whether the configured compiler is installed')
    .option('--output-format <format>', 'Output format: text (default) or json', 'text')
    .action(async (opts: { outputFormat: string }, command: Command) => {
      const exitCode = await runCheckAction(
        { ...readGlobalOptions(command), outputFormat: parseOutputFormat(opts.outputFormat) },
        { version },
      )
      process.exitCode = exitCode
    })
}
