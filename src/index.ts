/**
 * texsmith - Main module exports
 * Public API surface for embedding the render pipeline
 */

// Core errors
export * from './core/errors.js'
// Stack wiring
export { createRenderStack } from './core/bootstrap.js'
export type { RenderStack, RenderStackOptions } from './core/bootstrap.js'

// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'
export { runProcess, probeBinary } from './utils/process-runner.js'
export type { ProcessRunner, ProcessResult, SpawnCommand, BinaryProbeResult } from './utils/process-runner.js'

// Modules
export * from './modules/renderer/index.js'
export * from './modules/templating/index.js'
export * from './modules/render-service/index.js'
export * from './modules/render-pool/index.js'
export * from './modules/render-tools/index.js'
export * from './modules/config/index.js'
