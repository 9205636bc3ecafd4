/**
 * `texsmith render` command
 *
 * Writes LaTeX source read from a file (or `-` for stdin) into the work
 * directory and compiles it unless `--no-compile` is given.
 */

import { readFile } from 'fs/promises'
import { InvalidArgumentError, type Command } from 'commander'
import type { RenderTools, ToolHooks, ToolResult } from '../../modules/render-tools/render-tools.js'
import { buildJsonOutput, formatToolResult } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  parseOutputFormat,
  readGlobalOptions,
  reportError,
  withRenderStack,
  type CommandDeps,
  type GlobalCliOptions,
  type OutputFormat,
} from '../utils/stack.js'

/**
 * Options every rendering command accepts.
 */
export interface RenderJobCliOptions extends GlobalCliOptions {
  jobname?: string
  compile: boolean
  runs?: number
  outputFormat: OutputFormat
}

export interface RenderCommandDeps extends CommandDeps {
  /** Stream read when the file argument is `-` (default: process.stdin) */
  stdin?: NodeJS.ReadableStream
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Commander parser for `--runs`.
 */
export function parseRunsOption(raw: string): number {
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError('Expected an integer.')
  }
  return value
}

/**
 * Read all of `stream` as UTF-8.
 */
export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk)
  }
  return Buffer.concat(chunks).toString('utf-8')
}

/**
 * Job options shared by `render` and `template`, in tool-input shape.
 */
export function jobInput(opts: RenderJobCliOptions): Record<string, unknown> {
  return {
    ...(opts.jobname !== undefined && { jobname: opts.jobname }),
    compile: opts.compile,
    ...(opts.runs !== undefined && { runs: opts.runs }),
  }
}

/**
 * Run one tool call against a fresh stack and print its outcome.
 *
 * Advisories go to stderr as they are raised; the result goes to stdout.
 */
export async function runToolCommand(
  commandName: string,
  opts: RenderJobCliOptions,
  deps: CommandDeps,
  call: (tools: RenderTools, hooks: ToolHooks) => Promise<ToolResult>,
): Promise<number> {
  const hooks: ToolHooks = {
    onWarning: (message) => {
      process.stderr.write(`Warning: ${message}\n`)
    },
  }

  try {
    const result = await withRenderStack(opts, deps, (stack) => call(stack.tools, hooks))
    if (opts.outputFormat === 'json') {
      const output = buildJsonOutput(commandName, result, deps.version ?? '0.0.0')
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    } else {
      process.stdout.write(formatToolResult(result) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

/**
 * Add the job flags shared by `render` and `template`.
 */
export function addRenderJobOptions(command: Command): Command {
  return command
    .option('--jobname <name>', 'Job name for the .tex/.pdf pair (default: generated)')
    .option('--no-compile', 'Only write the .tex source')
    .option('--runs <n>', 'Number of compiler passes', parseRunsOption)
    .option('--output-format <format>', 'Output format: text (default) or json', 'text')
}

// ---------------------------------------------------------------------------
// Action
// ---------------------------------------------------------------------------

export async function runRenderAction(
  file: string,
  opts: RenderJobCliOptions,
  deps: RenderCommandDeps = {},
): Promise<number> {
  let tex: string
  try {
    tex = file === '-'
      ? await readStream(deps.stdin ?? process.stdin)
      : await readFile(file, 'utf-8')
  } catch (err) {
    return reportError(err)
  }

  return runToolCommand('texsmith render', opts, deps, (tools, hooks) =>
    tools.renderLatexDocument({ tex, ...jobInput(opts) }, hooks),
  )
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerRenderCommand(program: Command, version: string): void {
  const renderCmd = program
    .command('render <file>')
    .description('Write a LaTeX source file (or - for stdin) and compile it to PDF')

  addRenderJobOptions(renderCmd).action(
    async (
      file: string,
      opts: { jobname?: string; compile: boolean; runs?: number; outputFormat: string },
      command: Command,
    ) => {
      const exitCode = await runRenderAction(
        file,
        {
          ...readGlobalOptions(command),
          ...(opts.jobname !== undefined && { jobname: opts.jobname }),
          compile: opts.compile,
          ...(opts.runs !== undefined && { runs: opts.runs }),
          outputFormat: parseOutputFormat(opts.outputFormat),
        },
        { version },
      )
      process.exitCode = exitCode
    },
  )
}
