/**
 * Subprocess execution for external toolchain binaries.
 *
 * Uses child_process.spawn and resolves with a structured result instead of
 * rejecting on a non-zero exit: callers classify the outcome themselves.
 */

import { spawn } from 'node:child_process'
import { createLogger } from './logger.js'

const logger = createLogger('process-runner')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Everything needed to execute one external process.
 */
export interface SpawnCommand {
  /** The binary to execute (e.g. "pdflatex") */
  binary: string
  /** Arguments to pass to the binary */
  args: string[]
  /** Working directory for the process */
  cwd: string
  /** Environment variable overrides, merged over process.env */
  env?: Record<string, string>
  /** Kill the process with SIGKILL after this many milliseconds (0 or absent = no deadline) */
  timeoutMs?: number
}

/**
 * Outcome of a finished process.
 */
export interface ProcessResult {
  /** Exit status, or null when the process was killed or never started */
  exitCode: number | null
  /** stdout and stderr interleaved in arrival order */
  output: string
  /** True when the deadline fired and the process was killed */
  timedOut: boolean
  /** Set when spawn itself failed (e.g. ENOENT) */
  spawnError?: string
}

/** Injection seam used by the compiler invoker and its tests */
export type ProcessRunner = (cmd: SpawnCommand) => Promise<ProcessResult>

// ---------------------------------------------------------------------------
// runProcess
// ---------------------------------------------------------------------------

/**
 * Spawn `cmd.binary` and capture its combined output.
 *
 * Never rejects. stdin is closed immediately so a tool waiting on input
 * sees EOF instead of blocking.
 */
export function runProcess(cmd: SpawnCommand): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve) => {
    const chunks: Buffer[] = []
    let settled = false
    let timedOut = false
    let timeoutHandle: ReturnType<typeof setTimeout> | null = null

    const finish = (result: Omit<ProcessResult, 'output' | 'timedOut'>): void => {
      if (settled) return
      settled = true
      if (timeoutHandle !== null) {
        clearTimeout(timeoutHandle)
        timeoutHandle = null
      }
      resolve({
        ...result,
        output: Buffer.concat(chunks).toString('utf-8'),
        timedOut,
      })
    }

    const proc = spawn(cmd.binary, cmd.args, {
      cwd: cmd.cwd,
      env: { ...process.env, ...cmd.env },
      stdio: ['pipe', 'pipe', 'pipe'],
    })

    proc.stdin?.end()

    proc.stdout?.on('data', (chunk: Buffer) => {
      chunks.push(chunk)
    })
    proc.stderr?.on('data', (chunk: Buffer) => {
      chunks.push(chunk)
    })

    if (cmd.timeoutMs !== undefined && cmd.timeoutMs > 0) {
      const deadline = cmd.timeoutMs
      timeoutHandle = setTimeout(() => {
        timedOut = true
        logger.warn({ binary: cmd.binary, timeoutMs: deadline }, 'Process exceeded deadline, killing')
        proc.kill('SIGKILL')
      }, deadline)
    }

    proc.on('error', (err: Error) => {
      logger.debug({ binary: cmd.binary, err: err.message }, 'spawn failed')
      finish({ exitCode: null, spawnError: err.message })
    })

    proc.on('close', (exitCode: number | null) => {
      finish({ exitCode: timedOut ? null : exitCode })
    })
  })
}

// ---------------------------------------------------------------------------
// probeBinary
// ---------------------------------------------------------------------------

/**
 * Result of resolving a binary on the execution search path.
 */
export interface BinaryProbeResult {
  available: boolean
  /** Absolute path reported by `which`, when found */
  resolvedPath?: string
}

/**
 * Check whether `binary` resolves on PATH via `which`.
 *
 * `which` is available on macOS and Linux (target platforms). A missing
 * `which` is reported as "not available" rather than thrown.
 */
export async function probeBinary(
  binary: string,
  runner: ProcessRunner = runProcess,
): Promise<BinaryProbeResult> {
  const result = await runner({ binary: 'which', args: [binary], cwd: process.cwd() })
  const resolvedPath = result.output.trim().split('\n')[0]?.trim() ?? ''
  if (result.exitCode === 0 && resolvedPath !== '') {
    return { available: true, resolvedPath }
  }
  return { available: false }
}
