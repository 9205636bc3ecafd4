/**
 * RenderService implementation: composes job naming, source persistence,
 * template expansion and compilation.
 *
 * No state is kept between calls; each call walks
 * Start → Named → Written → (Skipped | Compiling → Succeeded | Failed).
 */

import { basename, resolve } from 'node:path'
import {
  ArtifactNotProducedError,
  CompileFailureError,
  JobnameCollisionError,
  MissingBinaryError,
} from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { fileExists } from '../../utils/helpers.js'
import type { CompilerInvoker } from '../renderer/compiler-invoker.js'
import { generateJobname, sanitizeJobname } from '../renderer/jobname.js'
import { sourcePathFor, writeSource } from '../renderer/source-writer.js'
import type { CompileOutcome } from '../renderer/types.js'
import type { TemplateContext, TemplateResolver } from '../templating/template-resolver.js'
import type { RenderOptions, RenderResult, RenderService, RenderServiceDeps } from './render-service.js'

const logger = createLogger('render-service')

/** How many generated names are tried before giving up */
export const MAX_GENERATED_JOBNAME_ATTEMPTS = 8

// ---------------------------------------------------------------------------
// RenderServiceImpl
// ---------------------------------------------------------------------------

export class RenderServiceImpl implements RenderService {
  readonly workDir: string

  private readonly _compiler: CompilerInvoker
  private readonly _templates: TemplateResolver
  private readonly _defaultRuns: number

  constructor(deps: RenderServiceDeps) {
    this.workDir = resolve(deps.workDir)
    this._compiler = deps.compiler
    this._templates = deps.templates
    this._defaultRuns = deps.defaultRuns ?? 1
  }

  async renderSource(sourceText: string, options: RenderOptions = {}): Promise<RenderResult> {
    const compile = options.compile ?? true
    const runs = options.runs ?? this._defaultRuns

    const jobname = await this._resolveJobname(options.jobname)
    const sourcePath = await writeSource(sourceText, jobname, this.workDir)
    logger.debug({ jobname, sourcePath, compile }, 'Source written')

    if (!compile) {
      return { jobname, sourcePath, artifactPath: null }
    }

    const outcome = await this._compiler.compile(sourcePath, runs)
    const artifactPath = this._unwrapOutcome(outcome, jobname, sourcePath)
    logger.info({ jobname, artifactPath, runs }, 'Document compiled')
    return { jobname, sourcePath, artifactPath }
  }

  async renderTemplate(
    templateName: string,
    context: TemplateContext,
    options: RenderOptions = {},
  ): Promise<RenderResult> {
    const sourceText = await this._templates.expand(templateName, context)
    return this.renderSource(sourceText, options)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /**
   * Caller-supplied names are only sanitized (a repeated name overwrites).
   * Generated names are redrawn while a source file with that stem exists,
   * so an anonymous job never clobbers an earlier one.
   */
  private async _resolveJobname(raw: string | null | undefined): Promise<string> {
    if (raw !== undefined && raw !== null && raw !== '') {
      return sanitizeJobname(raw)
    }

    for (let attempt = 0; attempt < MAX_GENERATED_JOBNAME_ATTEMPTS; attempt++) {
      const candidate = sanitizeJobname(generateJobname())
      if (!(await fileExists(sourcePathFor(candidate, this.workDir)))) {
        return candidate
      }
      logger.debug({ candidate }, 'Generated job name already in use, drawing another')
    }

    throw new JobnameCollisionError(this.workDir, MAX_GENERATED_JOBNAME_ATTEMPTS)
  }

  private _unwrapOutcome(outcome: CompileOutcome, jobname: string, sourcePath: string): string {
    switch (outcome.kind) {
      case 'success':
        return outcome.artifactPath
      case 'missing-binary':
        throw new MissingBinaryError(outcome.binary, jobname)
      case 'compile-failure':
        throw new CompileFailureError(basename(sourcePath), outcome.log, outcome.pass, {
          exitCode: outcome.exitCode,
          timedOut: outcome.timedOut,
        })
      case 'artifact-not-produced':
        throw new ArtifactNotProducedError(outcome.expectedPath)
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new RenderService.
 *
 * @example
 * const service = createRenderService({ workDir, compiler, templates })
 * const { artifactPath } = await service.renderSource(tex, { jobname: 'report', runs: 2 })
 */
export function createRenderService(deps: RenderServiceDeps): RenderService {
  return new RenderServiceImpl(deps)
}
