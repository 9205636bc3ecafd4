/**
 * Barrel exports for the renderer module.
 */

export {
  sanitizeJobname,
  generateJobname,
  DEFAULT_JOBNAME,
  GENERATED_JOBNAME_PREFIX,
} from './jobname.js'
export {
  writeSource,
  sourcePathFor,
  SOURCE_EXTENSION,
  ARTIFACT_EXTENSION,
} from './source-writer.js'
export {
  CompilerInvoker,
  createCompilerInvoker,
  artifactPathFor,
  joinSearchPaths,
  DEFAULT_COMPILER_BINARY,
  SEARCH_PATH_ENV,
  COMPILER_FLAGS,
} from './compiler-invoker.js'
export type {
  CompileOutcome,
  CompileOutcomeKind,
  CompilerAvailability,
  CompilerInvokerOptions,
} from './types.js'
