/**
 * TemplateResolver interface: public contract for template expansion.
 *
 * The render service only consumes the expanded source string; it must be
 * able to tell "template not found" apart from every other failure.
 */

/** Naming suffix identifying stored LaTeX templates */
export const TEMPLATE_SUFFIX = '.tex.hbs'

/**
 * Data context handed to a template. Values are arbitrary JSON-like data.
 */
export type TemplateContext = Record<string, unknown>

export interface TemplateResolver {
  /**
   * Expand `name` with `context` into document source text.
   * @throws {TemplateNotFoundError} if `name` is not a stored template
   * @throws {TemplateRenderError} if the template cannot be compiled or rendered
   */
  expand(name: string, context: TemplateContext): Promise<string>

  /**
   * Names of all stored templates (files ending in TEMPLATE_SUFFIX), sorted.
   */
  listTemplates(): Promise<string[]>
}
