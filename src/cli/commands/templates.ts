/**
 * `texsmith templates` command
 *
 * Lists the templates available under the configured template directory.
 */

import { resolve } from 'path'
import type { Command } from 'commander'
import { HandlebarsTemplateEngine } from '../../modules/templating/handlebars-template-engine.js'
import { buildJsonOutput, formatTemplateList } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  loadCliConfig,
  parseOutputFormat,
  readGlobalOptions,
  reportError,
  type CommandDeps,
  type GlobalCliOptions,
  type OutputFormat,
} from '../utils/stack.js'

export interface TemplatesCliOptions extends GlobalCliOptions {
  outputFormat: OutputFormat
}

export async function runTemplatesAction(
  opts: TemplatesCliOptions,
  deps: CommandDeps = {},
): Promise<number> {
  try {
    const config = await loadCliConfig(opts, deps)
    const templateDir = resolve(deps.cwd ?? process.cwd(), config.global.template_dir)
    const names = await new HandlebarsTemplateEngine({ templateDir }).listTemplates()

    if (opts.outputFormat === 'json') {
      const output = buildJsonOutput('texsmith templates', { templateDir, templates: names }, deps.version ?? '0.0.0')
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    } else {
      process.stdout.write(formatTemplateList(names, templateDir) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export function registerTemplatesCommand(program: Command, version: string): void {
  program
    .command('templates')
    .description('List the templates that can be rendered')
    .option('--output-format <format>', 'Output format: text (default) or json', 'text')
    .action(async (opts: { outputFormat: string }, command: Command) => {
      const exitCode = await runTemplatesAction(
        { ...readGlobalOptions(command), outputFormat: parseOutputFormat(opts.outputFormat) },
        { version },
      )
      process.exitCode = exitCode
    })
}
