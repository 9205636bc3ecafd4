/**
 * `texsmith template` command
 *
 * Expands a stored template with a context object and renders the result
 * the same way `texsmith render` does.
 */

import { readFile } from 'fs/promises'
import yaml from 'js-yaml'
import type { Command } from 'commander'
import { InvalidInputError } from '../../core/errors.js'
import { errorMessage, isPlainObject } from '../../utils/helpers.js'
import {
  addRenderJobOptions,
  jobInput,
  runToolCommand,
  type RenderJobCliOptions,
} from './render.js'
import {
  parseOutputFormat,
  readGlobalOptions,
  reportError,
  type CommandDeps,
} from '../utils/stack.js'

export interface TemplateCliOptions extends RenderJobCliOptions {
  /** Inline JSON object */
  context?: string
  /** Path to a YAML or JSON file holding the context object */
  contextFile?: string
}

/**
 * Build the template context from `--context-file` and `--context`.
 * Keys given inline win over keys from the file.
 *
 * @throws {InvalidInputError} when a source cannot be read or parsed
 */
export async function loadTemplateContext(
  opts: Pick<TemplateCliOptions, 'context' | 'contextFile'>,
): Promise<unknown> {
  let fromFile: unknown = {}
  if (opts.contextFile !== undefined) {
    let raw: string
    try {
      raw = await readFile(opts.contextFile, 'utf-8')
    } catch (err) {
      throw new InvalidInputError(`Cannot read context file ${opts.contextFile}: ${errorMessage(err)}`, {
        contextFile: opts.contextFile,
      })
    }
    try {
      fromFile = yaml.load(raw) ?? {}
    } catch (err) {
      throw new InvalidInputError(`Invalid context file ${opts.contextFile}: ${errorMessage(err)}`, {
        contextFile: opts.contextFile,
      })
    }
  }

  if (opts.context === undefined) return fromFile

  let inline: unknown
  try {
    inline = JSON.parse(opts.context)
  } catch (err) {
    throw new InvalidInputError(`--context is not valid JSON: ${errorMessage(err)}`)
  }

  // Anything that is not an object is left for the tool schema to reject
  if (!isPlainObject(fromFile)) return fromFile
  if (!isPlainObject(inline)) return inline
  return { ...fromFile, ...inline }
}

// ---------------------------------------------------------------------------
// Action
// ---------------------------------------------------------------------------

export async function runTemplateAction(
  templateName: string,
  opts: TemplateCliOptions,
  deps: CommandDeps = {},
): Promise<number> {
  let context: unknown
  try {
    context = await loadTemplateContext(opts)
  } catch (err) {
    return reportError(err)
  }

  return runToolCommand('texsmith template', opts, deps, (tools, hooks) =>
    tools.renderTemplateDocument({ templateName, context, ...jobInput(opts) }, hooks),
  )
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerTemplateCommand(program: Command, version: string): void {
  const templateCmd = program
    .command('template <name>')
    .description('Render a stored template with a context object and compile it to PDF')
    .option('--context <json>', 'Template context as a JSON object')
    .option('--context-file <path>', 'YAML or JSON file holding the template context')

  addRenderJobOptions(templateCmd).action(
    async (
      name: string,
      opts: {
        context?: string
        contextFile?: string
        jobname?: string
        compile: boolean
        runs?: number
        outputFormat: string
      },
      command: Command,
    ) => {
      const exitCode = await runTemplateAction(
        name,
        {
          ...readGlobalOptions(command),
          ...(opts.context !== undefined && { context: opts.context }),
          ...(opts.contextFile !== undefined && { contextFile: opts.contextFile }),
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
