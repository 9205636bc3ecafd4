/**
 * Barrel exports for the render-tools module.
 */

export { RenderTools } from './render-tools.js'
export type { ToolResult, ToolHooks, RenderToolsDeps } from './render-tools.js'
export {
  RenderLatexInputSchema,
  RenderTemplateInputSchema,
  MAX_RUNS,
  validateWithSchema,
} from './schemas.js'
export type { RenderLatexInput, RenderTemplateInput } from './schemas.js'
