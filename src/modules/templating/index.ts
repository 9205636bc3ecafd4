/**
 * Barrel exports for the templating module.
 */

export { HandlebarsTemplateEngine } from './handlebars-template-engine.js'
export type { HandlebarsTemplateEngineOptions } from './handlebars-template-engine.js'
export { TEMPLATE_SUFFIX } from './template-resolver.js'
export type { TemplateResolver, TemplateContext } from './template-resolver.js'
