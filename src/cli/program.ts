/**
 * Builds the `texsmith` Commander program.
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { isPlainObject } from '../utils/helpers.js'
import { registerRenderCommand } from './commands/render.js'
import { registerTemplateCommand } from './commands/template.js'
import { registerTemplatesCommand } from './commands/templates.js'
import { registerCheckCommand } from './commands/check.js'
import { registerConfigCommand } from './commands/config.js'

/** Resolve the package version from package.json next to src/ or dist/ */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // Run from dist/cli or src/cli
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    let pkg: unknown
    try {
      pkg = JSON.parse(await readFile(pkgPath, 'utf-8'))
    } catch {
      continue
    }
    if (isPlainObject(pkg) && pkg.name === 'texsmith' && typeof pkg.version === 'string') {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('texsmith')
    .description('texsmith - render LaTeX sources and templates to PDF')
    .version(version, '-v, --version', 'Output the current version')
    .option('--work-dir <dir>', 'Directory receiving .tex and .pdf files')
    .option('--template-dir <dir>', 'Directory holding *.tex.hbs templates')
    .option('--compiler <binary>', 'Compiler executable (default: pdflatex)')
    .option('--project-config-dir <dir>', 'Path to project .texsmith/ directory')
    .option('--global-config-dir <dir>', 'Path to global .texsmith/ directory')

  registerRenderCommand(program, version)
  registerTemplateCommand(program, version)
  registerTemplatesCommand(program, version)
  registerCheckCommand(program, version)
  registerConfigCommand(program, version)

  return program
}
