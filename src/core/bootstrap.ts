/**
 * Builds the render stack from a loaded configuration.
 *
 * All wiring happens here: modules receive their collaborators through
 * constructor arguments and never look up shared state themselves.
 */

import { resolve } from 'node:path'
import type { TexsmithConfig } from '../modules/config/config-schema.js'
import { createCompilerInvoker, CompilerInvoker } from '../modules/renderer/compiler-invoker.js'
import type { CompilerAvailability } from '../modules/renderer/types.js'
import { HandlebarsTemplateEngine } from '../modules/templating/handlebars-template-engine.js'
import type { TemplateResolver } from '../modules/templating/template-resolver.js'
import { createRenderService } from '../modules/render-service/render-service-impl.js'
import type { RenderService } from '../modules/render-service/render-service.js'
import { RenderPool } from '../modules/render-pool/render-pool.js'
import { RenderTools } from '../modules/render-tools/render-tools.js'
import type { ProcessRunner } from '../utils/process-runner.js'
import { createLogger, setLogLevel } from '../utils/logger.js'

const logger = createLogger('bootstrap')

export interface RenderStack {
  config: TexsmithConfig
  workDir: string
  compiler: CompilerInvoker
  templates: TemplateResolver
  service: RenderService
  pool: RenderPool
  tools: RenderTools
  /** Wait for in-flight renders; call once the stack is no longer needed */
  shutdown(): Promise<void>
}

export interface RenderStackOptions {
  /** Directory relative config paths resolve against (default: process.cwd()) */
  cwd?: string
  /** Skip probing and use this availability (tests) */
  availability?: CompilerAvailability
  /** Process runner override (tests) */
  runner?: ProcessRunner
}

/**
 * Create every component named in the configuration.
 *
 * Call `stack.shutdown()` when done.
 */
export async function createRenderStack(
  config: TexsmithConfig,
  options: RenderStackOptions = {},
): Promise<RenderStack> {
  setLogLevel(config.global.log_level)

  const cwd = options.cwd ?? process.cwd()
  const workDir = resolve(cwd, config.global.work_dir)
  const templateDir = resolve(cwd, config.global.template_dir)
  const texInputs = config.compiler.tex_inputs.map((p) => resolve(cwd, p))

  const invokerOptions = {
    binary: config.compiler.binary,
    texInputs,
    timeoutMs: config.compiler.timeout_ms,
    ...(options.runner !== undefined ? { runner: options.runner } : {}),
  }
  const compiler = options.availability !== undefined
    ? new CompilerInvoker(options.availability, invokerOptions)
    : await createCompilerInvoker(invokerOptions)

  if (!compiler.available) {
    logger.warn({ binary: config.compiler.binary }, 'Compiler not found on PATH; renders will return source only')
  }

  const templates = new HandlebarsTemplateEngine({ templateDir })
  const service = createRenderService({
    workDir,
    compiler,
    templates,
    defaultRuns: config.compiler.default_runs,
  })
  const pool = new RenderPool(config.global.max_concurrent_renders)
  const tools = new RenderTools({ service, pool, templates })

  logger.debug({ workDir, templateDir, binary: compiler.binary }, 'Render stack ready')

  return {
    config,
    workDir,
    compiler,
    templates,
    service,
    pool,
    tools,
    shutdown: () => pool.shutdown(),
  }
}
