/**
 * Error definitions for texsmith
 * Provides structured error hierarchy for all render operations
 */

/** Base error class for all texsmith errors */
export class TexsmithError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'TexsmithError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TexsmithError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * Thrown when the compiler binary did not resolve on PATH when the invoker
 * was created. The only failure the tool layer degrades from.
 */
export class MissingBinaryError extends TexsmithError {
  public readonly binary: string
  /** Job whose source was already written when compilation was refused */
  public readonly jobname: string | undefined

  constructor(binary: string, jobname?: string) {
    super(`Compiler executable '${binary}' not found on PATH`, 'MISSING_BINARY', {
      binary,
      ...(jobname !== undefined && { jobname }),
    })
    this.name = 'MissingBinaryError'
    this.binary = binary
    this.jobname = jobname
  }
}

/** Thrown when a compiler pass exits with a non-zero status */
export class CompileFailureError extends TexsmithError {
  /** Combined stdout/stderr of the failing pass, verbatim */
  public readonly log: string
  /** 1-based number of the pass that failed */
  public readonly pass: number

  constructor(
    sourceFile: string,
    log: string,
    pass: number,
    context: Record<string, unknown> = {}
  ) {
    super(`compilation failed for ${sourceFile} on pass ${String(pass)}`, 'COMPILE_FAILURE', {
      sourceFile,
      pass,
      ...context,
    })
    this.name = 'CompileFailureError'
    this.log = log
    this.pass = pass
  }
}

/** Thrown when every pass exited cleanly but no artifact exists on disk */
export class ArtifactNotProducedError extends TexsmithError {
  constructor(expectedPath: string) {
    super(`compiler did not produce ${expectedPath}`, 'ARTIFACT_NOT_PRODUCED', {
      expectedPath,
    })
    this.name = 'ArtifactNotProducedError'
  }
}

/** Thrown when a template name does not resolve to a stored template */
export class TemplateNotFoundError extends TexsmithError {
  constructor(templateName: string) {
    super(`Template '${templateName}' not found`, 'TEMPLATE_NOT_FOUND', {
      templateName,
    })
    this.name = 'TemplateNotFoundError'
  }
}

/** Thrown when a template exists but cannot be compiled or rendered */
export class TemplateRenderError extends TexsmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TEMPLATE_RENDER_ERROR', context)
    this.name = 'TemplateRenderError'
  }
}

/** Thrown when tool input fails validation */
export class InvalidInputError extends TexsmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_INPUT', context)
    this.name = 'InvalidInputError'
  }
}

/** Thrown when no unused auto-generated job name could be found */
export class JobnameCollisionError extends TexsmithError {
  constructor(workDir: string, attempts: number) {
    super(
      `Could not find an unused job name in ${workDir} after ${String(attempts)} attempts`,
      'JOBNAME_COLLISION',
      { workDir, attempts }
    )
    this.name = 'JobnameCollisionError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends TexsmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}
