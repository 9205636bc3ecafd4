/**
 * Barrel exports for the render-service module.
 */

export { createRenderService, RenderServiceImpl, MAX_GENERATED_JOBNAME_ATTEMPTS } from './render-service-impl.js'
export type {
  RenderService,
  RenderServiceDeps,
  RenderResult,
  RenderOptions,
} from './render-service.js'
