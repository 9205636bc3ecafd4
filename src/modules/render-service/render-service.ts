/**
 * RenderService interface: public contract for the render-and-compile pipeline.
 *
 * Create an instance via `createRenderService()` from render-service-impl.ts.
 */

import type { CompilerInvoker } from '../renderer/compiler-invoker.js'
import type { TemplateContext, TemplateResolver } from '../templating/template-resolver.js'

// ---------------------------------------------------------------------------
// Results and options
// ---------------------------------------------------------------------------

/**
 * Paths produced by one render call. `artifactPath` is set only when the
 * compiler succeeded.
 */
export interface RenderResult {
  jobname: string
  sourcePath: string
  artifactPath: string | null
}

/**
 * Per-call options shared by both render operations.
 */
export interface RenderOptions {
  /** Caller-chosen job name; sanitized before use. Generated when absent. */
  jobname?: string | null
  /** Whether to invoke the compiler (default: true) */
  compile?: boolean
  /** Number of compiler passes; values below 1 mean a single pass */
  runs?: number
}

/**
 * Construction-time dependencies. The work directory is injected here and
 * never looked up globally.
 */
export interface RenderServiceDeps {
  workDir: string
  compiler: CompilerInvoker
  templates: TemplateResolver
  /** Number of passes used when a call gives none (default: 1) */
  defaultRuns?: number
}

// ---------------------------------------------------------------------------
// RenderService interface
// ---------------------------------------------------------------------------

export interface RenderService {
  /** Shared work directory all jobs write into */
  readonly workDir: string

  /**
   * Persist `sourceText` and, unless `compile` is false, compile it.
   *
   * @throws {MissingBinaryError} compiler absent at startup
   * @throws {CompileFailureError} a pass exited non-zero; carries the log
   * @throws {ArtifactNotProducedError} passes succeeded but no PDF exists
   */
  renderSource(sourceText: string, options?: RenderOptions): Promise<RenderResult>

  /**
   * Expand a stored template and hand the result to renderSource.
   *
   * @throws {TemplateNotFoundError} before anything is written
   */
  renderTemplate(
    templateName: string,
    context: TemplateContext,
    options?: RenderOptions,
  ): Promise<RenderResult>
}
