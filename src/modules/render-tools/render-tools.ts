/**
 * RenderTools: the caller-facing operations behind the CLI.
 *
 * Validates input, dispatches each render through the RenderPool and owns
 * the fallback policy: a MissingBinaryError on a compile request is retried
 * exactly once with compilation disabled and reported as an advisory. Every
 * other failure propagates unchanged.
 */

import { MissingBinaryError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { RenderPool } from '../render-pool/render-pool.js'
import type { RenderOptions, RenderResult, RenderService } from '../render-service/render-service.js'
import type { TemplateResolver } from '../templating/template-resolver.js'
import {
  RenderLatexInputSchema,
  RenderTemplateInputSchema,
  validateWithSchema,
} from './schemas.js'

const logger = createLogger('render-tools')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * What a tool call hands back to its caller.
 */
export interface ToolResult {
  /** One-line human-readable outcome */
  summary: string
  /** Source path, then the artifact path when one was produced */
  files: string[]
  structured: RenderResult
  /** Non-fatal advisories raised during the call */
  warnings: string[]
  /** True when compilation was requested but skipped because the compiler is missing */
  degraded: boolean
}

/**
 * Optional per-call callbacks.
 */
export interface ToolHooks {
  /** Receives each advisory as it is raised */
  onWarning?: (message: string) => void | Promise<void>
}

export interface RenderToolsDeps {
  service: RenderService
  pool: RenderPool
  templates: TemplateResolver
}

interface ToolMessages {
  success: string
  degraded: (binary: string) => string
  advisory: (binary: string) => string
}

const LATEX_MESSAGES: ToolMessages = {
  success: 'LaTeX rendered successfully.',
  degraded: (binary) => `LaTeX saved, but ${binary} was unavailable.`,
  advisory: (binary) => `${binary} not found; returning .tex artifact only.`,
}

const TEMPLATE_MESSAGES: ToolMessages = {
  success: 'Template rendered successfully.',
  degraded: (binary) => `Template rendered but ${binary} was unavailable.`,
  advisory: (binary) => `${binary} not found; returning LaTeX only.`,
}

// ---------------------------------------------------------------------------
// RenderTools
// ---------------------------------------------------------------------------

export class RenderTools {
  private readonly _service: RenderService
  private readonly _pool: RenderPool
  private readonly _templates: TemplateResolver

  constructor(deps: RenderToolsDeps) {
    this._service = deps.service
    this._pool = deps.pool
    this._templates = deps.templates
  }

  /**
   * Persist LaTeX source and optionally compile it to PDF.
   *
   * @throws {InvalidInputError} when `input` does not match RenderLatexInputSchema
   */
  async renderLatexDocument(input: unknown, hooks: ToolHooks = {}): Promise<ToolResult> {
    const { tex, ...options } = validateWithSchema(RenderLatexInputSchema, input, 'render_latex_document')
    return this._runWithFallback(
      options,
      (attempt) => this._service.renderSource(tex, attempt),
      LATEX_MESSAGES,
      hooks,
    )
  }

  /**
   * Render a stored template with context and optionally compile it to PDF.
   *
   * @throws {InvalidInputError} when `input` does not match RenderTemplateInputSchema
   * @throws {TemplateNotFoundError} never degraded or retried
   */
  async renderTemplateDocument(input: unknown, hooks: ToolHooks = {}): Promise<ToolResult> {
    const { templateName, context, ...options } = validateWithSchema(
      RenderTemplateInputSchema,
      input,
      'render_template_document',
    )
    return this._runWithFallback(
      options,
      (attempt) => this._service.renderTemplate(templateName, context, attempt),
      TEMPLATE_MESSAGES,
      hooks,
    )
  }

  /**
   * List the templates that can be rendered.
   */
  async listTemplates(): Promise<string[]> {
    return this._templates.listTemplates()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _runWithFallback(
    options: RenderOptions,
    render: (options: RenderOptions) => Promise<RenderResult>,
    messages: ToolMessages,
    hooks: ToolHooks,
  ): Promise<ToolResult> {
    const label = options.jobname ?? 'anonymous'

    try {
      const result = await this._pool.run(() => render(options), label)
      return buildToolResult(messages.success, result, [], false)
    } catch (err) {
      if (!(err instanceof MissingBinaryError) || options.compile === false) {
        throw err
      }

      // Reuse the name the first attempt wrote so the retry overwrites that source
      const jobname = err.jobname ?? options.jobname
      const advisory = messages.advisory(err.binary)
      logger.warn({ jobname, binary: err.binary }, advisory)
      if (hooks.onWarning !== undefined) {
        await hooks.onWarning(advisory)
      }

      const retry: RenderOptions = { ...options, jobname, compile: false }
      const result = await this._pool.run(() => render(retry), jobname ?? label)
      return buildToolResult(messages.degraded(err.binary), result, [advisory], true)
    }
  }
}

function buildToolResult(
  summary: string,
  result: RenderResult,
  warnings: string[],
  degraded: boolean,
): ToolResult {
  const files = [result.sourcePath]
  if (result.artifactPath !== null) {
    files.push(result.artifactPath)
  }
  return { summary, files, structured: result, warnings, degraded }
}
