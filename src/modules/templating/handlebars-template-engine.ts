/**
 * Handlebars-backed TemplateResolver for LaTeX templates stored on disk.
 *
 * Templates live flat under a template root as `<name>.tex.hbs`. Output is
 * never HTML-escaped, and placeholders with no value in the context render as
 * an empty string. Backslashes in front of a placeholder are kept as written,
 * so `\\{{city}}` yields a LaTeX line break followed by the value.
 */

import { mkdirSync } from 'node:fs'
import { readdir, readFile, stat } from 'node:fs/promises'
import { isAbsolute, relative, resolve, sep } from 'node:path'
import Handlebars from 'handlebars'
import { TemplateNotFoundError, TemplateRenderError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import { TEMPLATE_SUFFIX } from './template-resolver.js'
import type { TemplateContext, TemplateResolver } from './template-resolver.js'

const logger = createLogger('templating')

/**
 * Double the backslash that directly precedes each `{{`.
 *
 * Handlebars reads `\{{` as a literal mustache and `\\{{` as one backslash
 * plus a mustache; one extra backslash turns either back into the text as
 * written followed by a live placeholder.
 */
export function preserveBackslashes(source: string): string {
  return source.replace(/\\(?=\{\{)/g, '\\\\')
}

export interface HandlebarsTemplateEngineOptions {
  /** Directory holding `*.tex.hbs` files; created if absent */
  templateDir: string
}

export class HandlebarsTemplateEngine implements TemplateResolver {
  readonly templateDir: string

  private readonly _hbs: typeof Handlebars

  constructor(options: HandlebarsTemplateEngineOptions) {
    this.templateDir = resolve(options.templateDir)
    mkdirSync(this.templateDir, { recursive: true })
    // Isolated environment so helpers registered elsewhere never leak in.
    this._hbs = Handlebars.create()
  }

  async expand(name: string, context: TemplateContext): Promise<string> {
    const templatePath = await this._resolveTemplatePath(name)
    const source = await readFile(templatePath, 'utf-8')

    try {
      const template = this._hbs.compile<TemplateContext>(preserveBackslashes(source), { noEscape: true })
      return template(context)
    } catch (err) {
      logger.warn({ template: name, err: errorMessage(err) }, 'Template rendering failed')
      throw new TemplateRenderError(`Failed to render template '${name}': ${errorMessage(err)}`, {
        templateName: name,
        templatePath,
      })
    }
  }

  async listTemplates(): Promise<string[]> {
    const entries = await readdir(this.templateDir, { withFileTypes: true })
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(TEMPLATE_SUFFIX))
      .map((entry) => entry.name)
      .sort()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /**
   * Map a template name to a file inside the template root.
   *
   * Accepts either the full file name (`article.tex.hbs`) or its stem
   * (`article`). Names resolving outside the root count as not found.
   */
  private async _resolveTemplatePath(name: string): Promise<string> {
    if (name === '') throw new TemplateNotFoundError(name)

    const candidates = name.endsWith(TEMPLATE_SUFFIX) ? [name] : [name, `${name}${TEMPLATE_SUFFIX}`]
    for (const candidate of candidates) {
      const fullPath = resolve(this.templateDir, candidate)
      if (!this._isInsideRoot(fullPath)) continue
      if (await this._isFile(fullPath)) return fullPath
    }

    throw new TemplateNotFoundError(name)
  }

  private _isInsideRoot(fullPath: string): boolean {
    const rel = relative(this.templateDir, fullPath)
    return rel !== '' && !isAbsolute(rel) && rel !== '..' && !rel.startsWith(`..${sep}`)
  }

  private async _isFile(filePath: string): Promise<boolean> {
    try {
      return (await stat(filePath)).isFile()
    } catch {
      return false
    }
  }
}
