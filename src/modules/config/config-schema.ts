/**
 * Zod validation schemas for the texsmith configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings (directories, logging, concurrency)
 *  - compiler settings
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory receiving `{jobname}.tex` / `{jobname}.pdf`; relative paths resolve against cwd */
    work_dir: z.string().min(1),
    /** Directory holding `*.tex.hbs` templates */
    template_dir: z.string().min(1),
    /** Render calls allowed to run at once */
    max_concurrent_renders: z.number().int().min(1).max(32),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Compiler settings
// ---------------------------------------------------------------------------

export const CompilerSettingsSchema = z
  .object({
    /** Compiler executable name or path */
    binary: z.string().min(1),
    /** Extra include roots exported through TEXINPUTS */
    tex_inputs: z.array(z.string().min(1)),
    /** Passes used when a request gives none */
    default_runs: z.number().int().min(1).max(10),
    /** Per-pass deadline in milliseconds (0 = none) */
    timeout_ms: z.number().int().min(0),
  })
  .strict()

export type CompilerSettings = z.infer<typeof CompilerSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const TexsmithConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    compiler: CompilerSettingsSchema,
  })
  .strict()

export type TexsmithConfig = z.infer<typeof TexsmithConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (allows partial documents during load before merging)
// ---------------------------------------------------------------------------

export const PartialTexsmithConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    compiler: CompilerSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialTexsmithConfig = z.infer<typeof PartialTexsmithConfigSchema>
