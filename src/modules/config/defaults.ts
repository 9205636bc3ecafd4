/**
 * Built-in default values for the texsmith configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { TexsmithConfig, GlobalSettings, CompilerSettings } from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
  work_dir: 'artifacts',
  template_dir: 'templates',
  max_concurrent_renders: 2,
}

export const DEFAULT_COMPILER_SETTINGS: CompilerSettings = {
  binary: 'pdflatex',
  tex_inputs: [],
  default_runs: 1,
  timeout_ms: 0,
}

export const DEFAULT_CONFIG: TexsmithConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  compiler: DEFAULT_COMPILER_SETTINGS,
}
