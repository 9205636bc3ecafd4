/**
 * Barrel exports for the render-pool module.
 */

export { RenderPool } from './render-pool.js'
export type { RenderPoolStats } from './render-pool.js'
