/**
 * CLI output formatting utilities
 */

import type { ToolResult } from '../../modules/render-tools/render-tools.js'

/**
 * CLIJsonOutput wrapper type for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  /** texsmith version string */
  version: string
  /** The CLI command that was executed */
  command: string
  /** The actual data payload */
  data: T
}

/**
 * Build a CLIJsonOutput wrapper around data.
 */
export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}

/**
 * Human-readable lines for a finished render.
 *
 * @example
 * LaTeX rendered successfully.
 *   source:   /work/report.tex
 *   artifact: /work/report.pdf
 */
export function formatToolResult(result: ToolResult): string {
  const lines = [result.summary, `  source:   ${result.structured.sourcePath}`]
  if (result.structured.artifactPath !== null) {
    lines.push(`  artifact: ${result.structured.artifactPath}`)
  }
  return lines.join('\n')
}

/**
 * One template name per line, or a notice when there are none.
 */
export function formatTemplateList(names: string[], templateDir: string): string {
  if (names.length === 0) {
    return `No templates found in ${templateDir}`
  }
  return names.join('\n')
}
