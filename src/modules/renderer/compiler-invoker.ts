/**
 * CompilerInvoker: runs the external LaTeX compiler over a source file.
 *
 * Availability of the binary is probed once, before construction, and kept
 * as an immutable field: a missing compiler is reported without spawning
 * anything, so "not installed" is never confused with "installed but crashed".
 */

import { basename, delimiter, dirname, extname } from 'node:path'
import { tmpdir } from 'node:os'
import { createLogger } from '../../utils/logger.js'
import { fileExists, formatDuration } from '../../utils/helpers.js'
import { probeBinary, runProcess } from '../../utils/process-runner.js'
import type { ProcessRunner, SpawnCommand } from '../../utils/process-runner.js'
import { ARTIFACT_EXTENSION } from './source-writer.js'
import type { CompileOutcome, CompilerAvailability, CompilerInvokerOptions } from './types.js'

const logger = createLogger('compiler-invoker')

/** Compiler used when none is configured */
export const DEFAULT_COMPILER_BINARY = 'pdflatex'

/** Environment variable the TeX toolchain reads include roots from */
export const SEARCH_PATH_ENV = 'TEXINPUTS'

/** Flags passed on every pass: stop at the first error, never prompt */
export const COMPILER_FLAGS: readonly string[] = ['-halt-on-error', '-interaction=nonstopmode']

/**
 * Build the TEXINPUTS value for `paths`.
 *
 * The empty entry keeps the compiler's default search locations; the system
 * temp dir is appended last.
 */
export function joinSearchPaths(paths: readonly string[]): string {
  return [...paths, '', tmpdir()].join(delimiter)
}

/**
 * Path of the artifact the compiler is expected to write next to `sourcePath`.
 */
export function artifactPathFor(sourcePath: string): string {
  const ext = extname(sourcePath)
  const stem = ext === '' ? sourcePath : sourcePath.slice(0, -ext.length)
  return `${stem}${ARTIFACT_EXTENSION}`
}

// ---------------------------------------------------------------------------
// CompilerInvoker
// ---------------------------------------------------------------------------

export class CompilerInvoker {
  readonly binary: string
  readonly availability: CompilerAvailability
  readonly texInputs: readonly string[]
  readonly timeoutMs: number

  private readonly _runner: ProcessRunner

  constructor(availability: CompilerAvailability, options: CompilerInvokerOptions = {}) {
    this.binary = options.binary ?? DEFAULT_COMPILER_BINARY
    this.availability = Object.freeze({ ...availability })
    this.texInputs = Object.freeze([...(options.texInputs ?? [])])
    this.timeoutMs = options.timeoutMs ?? 0
    this._runner = options.runner ?? runProcess
  }

  get available(): boolean {
    return this.availability.available
  }

  /**
   * Compile `sourcePath` `max(runs, 1)` times.
   *
   * @param sourcePath           Absolute path of the `.tex` file
   * @param runs                 Requested number of passes
   * @param auxiliarySearchPaths Extra include roots; defaults to the configured texInputs
   */
  async compile(
    sourcePath: string,
    runs = 1,
    auxiliarySearchPaths?: readonly string[],
  ): Promise<CompileOutcome> {
    if (!this.availability.available) {
      logger.debug({ binary: this.binary }, 'Compiler unavailable, skipping invocation')
      return { kind: 'missing-binary', binary: this.binary }
    }

    const searchPaths = auxiliarySearchPaths ?? this.texInputs
    const env: Record<string, string> = {}
    if (searchPaths.length > 0) {
      env[SEARCH_PATH_ENV] = joinSearchPaths(searchPaths)
    }

    const passes = Math.max(Number.isFinite(runs) ? Math.floor(runs) : 1, 1)
    const cmd: SpawnCommand = {
      binary: this.binary,
      args: [...COMPILER_FLAGS, basename(sourcePath)],
      cwd: dirname(sourcePath),
      env,
      ...(this.timeoutMs > 0 ? { timeoutMs: this.timeoutMs } : {}),
    }

    for (let pass = 1; pass <= passes; pass++) {
      const startedAt = Date.now()
      const result = await this._runner(cmd)
      const elapsed = formatDuration(Date.now() - startedAt)

      if (result.exitCode !== 0) {
        logger.warn(
          { sourcePath, pass, passes, exitCode: result.exitCode, timedOut: result.timedOut, elapsed },
          'Compiler pass failed',
        )
        const log = result.spawnError !== undefined
          ? `${result.output}${result.spawnError}`
          : result.output
        return {
          kind: 'compile-failure',
          log,
          pass,
          exitCode: result.exitCode,
          timedOut: result.timedOut,
        }
      }

      logger.debug({ sourcePath, pass, passes, elapsed }, 'Compiler pass finished')
    }

    const artifactPath = artifactPathFor(sourcePath)
    if (!(await fileExists(artifactPath))) {
      logger.warn({ sourcePath, artifactPath }, 'Compiler exited cleanly but produced no artifact')
      return { kind: 'artifact-not-produced', expectedPath: artifactPath }
    }

    return { kind: 'success', artifactPath }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Probe the compiler binary once and create an invoker bound to the result.
 *
 * @example
 * const invoker = await createCompilerInvoker({ binary: 'pdflatex' })
 * if (!invoker.available) console.warn('pdflatex missing')
 */
export async function createCompilerInvoker(
  options: CompilerInvokerOptions = {},
): Promise<CompilerInvoker> {
  const binary = options.binary ?? DEFAULT_COMPILER_BINARY
  const probe = await probeBinary(binary, options.runner)
  logger.debug({ binary, ...probe }, 'Compiler availability probed')
  return new CompilerInvoker(probe, options)
}
