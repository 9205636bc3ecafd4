/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import {
  TexsmithConfigSchema,
  PartialTexsmithConfigSchema,
  GlobalSettingsSchema,
  CompilerSettingsSchema,
} from '../config-schema.js'
import { DEFAULT_CONFIG, DEFAULT_COMPILER_SETTINGS, DEFAULT_GLOBAL_SETTINGS } from '../defaults.js'

describe('TexsmithConfigSchema', () => {
  it('accepts the built-in default config', () => {
    expect(TexsmithConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('rejects unknown config_format_version', () => {
    const result = TexsmithConfigSchema.safeParse({ ...DEFAULT_CONFIG, config_format_version: '2' })
    expect(result.success).toBe(false)
  })

  it('rejects extra top-level fields (strict)', () => {
    const result = TexsmithConfigSchema.safeParse({ ...DEFAULT_CONFIG, providers: {} })
    expect(result.success).toBe(false)
  })
})

describe('GlobalSettingsSchema', () => {
  it('rejects invalid log_level', () => {
    const result = GlobalSettingsSchema.safeParse({ ...DEFAULT_GLOBAL_SETTINGS, log_level: 'loud' })
    expect(result.success).toBe(false)
  })

  it('accepts max_concurrent_renders within 1..32', () => {
    for (const value of [1, 32]) {
      expect(GlobalSettingsSchema.safeParse({ ...DEFAULT_GLOBAL_SETTINGS, max_concurrent_renders: value }).success).toBe(true)
    }
    for (const value of [0, 33, 1.5]) {
      expect(GlobalSettingsSchema.safeParse({ ...DEFAULT_GLOBAL_SETTINGS, max_concurrent_renders: value }).success).toBe(false)
    }
  })

  it('rejects an empty work_dir', () => {
    expect(GlobalSettingsSchema.safeParse({ ...DEFAULT_GLOBAL_SETTINGS, work_dir: '' }).success).toBe(false)
  })
})

describe('CompilerSettingsSchema', () => {
  it('bounds default_runs to 1..10', () => {
    expect(CompilerSettingsSchema.safeParse({ ...DEFAULT_COMPILER_SETTINGS, default_runs: 10 }).success).toBe(true)
    expect(CompilerSettingsSchema.safeParse({ ...DEFAULT_COMPILER_SETTINGS, default_runs: 0 }).success).toBe(false)
    expect(CompilerSettingsSchema.safeParse({ ...DEFAULT_COMPILER_SETTINGS, default_runs: 11 }).success).toBe(false)
  })

  it('rejects a negative timeout', () => {
    expect(CompilerSettingsSchema.safeParse({ ...DEFAULT_COMPILER_SETTINGS, timeout_ms: -1 }).success).toBe(false)
  })

  it('requires tex_inputs entries to be non-empty strings', () => {
    expect(CompilerSettingsSchema.safeParse({ ...DEFAULT_COMPILER_SETTINGS, tex_inputs: ['/styles'] }).success).toBe(true)
    expect(CompilerSettingsSchema.safeParse({ ...DEFAULT_COMPILER_SETTINGS, tex_inputs: [''] }).success).toBe(false)
  })
})

describe('PartialTexsmithConfigSchema', () => {
  it('accepts an empty document and single-key sections', () => {
    expect(PartialTexsmithConfigSchema.safeParse({}).success).toBe(true)
    expect(PartialTexsmithConfigSchema.safeParse({ compiler: { binary: 'xelatex' } }).success).toBe(true)
  })

  it('rejects unknown keys inside a section', () => {
    expect(PartialTexsmithConfigSchema.safeParse({ compiler: { engine: 'xelatex' } }).success).toBe(false)
  })
})
