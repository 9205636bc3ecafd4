/**
 * Type definitions for the renderer module
 */

import type { ProcessRunner } from '../../utils/process-runner.js'

/**
 * Whether the compiler binary resolved on PATH.
 * Fixed for the lifetime of a CompilerInvoker.
 */
export interface CompilerAvailability {
  readonly available: boolean
  /** Absolute path of the resolved binary, when known */
  readonly resolvedPath?: string
}

/**
 * Result of one `compile()` call. Exactly one variant per invocation.
 */
export type CompileOutcome =
  | { kind: 'success'; artifactPath: string }
  | { kind: 'missing-binary'; binary: string }
  | {
      kind: 'compile-failure'
      /** Combined output of the failing pass only */
      log: string
      /** 1-based pass number that failed */
      pass: number
      exitCode: number | null
      timedOut: boolean
    }
  | { kind: 'artifact-not-produced'; expectedPath: string }

export type CompileOutcomeKind = CompileOutcome['kind']

/**
 * Construction options for a CompilerInvoker.
 */
export interface CompilerInvokerOptions {
  /** Compiler executable name or path (default: "pdflatex") */
  binary?: string
  /** Default auxiliary search roots exported through TEXINPUTS */
  texInputs?: readonly string[]
  /** Per-pass deadline in milliseconds; 0 disables it */
  timeoutMs?: number
  /** Process runner override (tests) */
  runner?: ProcessRunner
}
