/**
 * Unit tests for the `texsmith config` command group
 *
 * Tests:
 *  - config show in YAML and JSON
 *  - config get for scalars, sections and unknown keys
 *  - config set with valid and invalid keys/values
 *  - Error handling for invalid config files
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, writeFile, rm, readFile, mkdtemp } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import yaml from 'js-yaml'
import {
  runConfigShow,
  runConfigGet,
  runConfigSet,
  coerceValue,
  CONFIG_EXIT_SUCCESS,
  CONFIG_EXIT_INVALID,
  type ConfigCommandOptions,
} from '../config.js'
import { DEFAULT_CONFIG } from '../../../modules/config/defaults.js'

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'texsmith-config-cmd-'))
  projectConfigDir = join(testDir, '.texsmith')
  globalConfigDir = join(testDir, 'global', '.texsmith')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function captureOutput(): { getStdout: () => string; getStderr: () => string } {
  let stdout = ''
  let stderr = ''
  vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : data.toString()
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : data.toString()
    return true
  })
  return { getStdout: () => stdout, getStderr: () => stderr }
}

function dirs(extra: ConfigCommandOptions = {}): ConfigCommandOptions {
  return { projectConfigDir, globalConfigDir, env: {}, ...extra }
}

async function writeConfigYaml(content: string): Promise<void> {
  await writeFile(join(projectConfigDir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

describe('config show', () => {
  it('prints the merged config as YAML with a header', async () => {
    const out = captureOutput()

    const exitCode = await runConfigShow(dirs())

    expect(exitCode).toBe(CONFIG_EXIT_SUCCESS)
    expect(out.getStdout()).toBe(`# texsmith configuration\n\n${yaml.dump(DEFAULT_CONFIG)}`)
  })

  it('prints JSON with --format json', async () => {
    await writeConfigYaml('compiler:\n  binary: xelatex\n')
    const out = captureOutput()

    await runConfigShow({ ...dirs(), format: 'json' })

    expect(JSON.parse(out.getStdout())).toEqual({
      ...DEFAULT_CONFIG,
      compiler: { ...DEFAULT_CONFIG.compiler, binary: 'xelatex' },
    })
  })

  it('reflects CLI and env overrides', async () => {
    const out = captureOutput()

    await runConfigShow({
      ...dirs({ workDir: 'build', env: { TEXSMITH_COMPILER: 'lualatex' } }),
      format: 'json',
    })

    expect(JSON.parse(out.getStdout())).toMatchObject({
      global: { work_dir: 'build' },
      compiler: { binary: 'lualatex' },
    })
  })

  it('exits 2 on an invalid config file', async () => {
    await writeConfigYaml('global:\n  max_concurrent_renders: 0\n')
    const out = captureOutput()

    const exitCode = await runConfigShow(dirs())

    expect(exitCode).toBe(CONFIG_EXIT_INVALID)
    expect(out.getStderr()).toMatch(/^ {2}Configuration error: Invalid config file at /)
    expect(out.getStdout()).toBe('')
  })
})

// ---------------------------------------------------------------------------
// config get
// ---------------------------------------------------------------------------

describe('config get', () => {
  it('prints string values raw', async () => {
    const out = captureOutput()

    const exitCode = await runConfigGet('compiler.binary', dirs())

    expect(exitCode).toBe(CONFIG_EXIT_SUCCESS)
    expect(out.getStdout()).toBe('pdflatex\n')
  })

  it('prints other values as JSON', async () => {
    const out = captureOutput()

    await runConfigGet('compiler', dirs())

    expect(out.getStdout()).toBe(
      '{"binary":"pdflatex","tex_inputs":[],"default_runs":1,"timeout_ms":0}\n',
    )
  })

  it('exits 2 for an unknown key', async () => {
    const out = captureOutput()

    const exitCode = await runConfigGet('compiler.engine', dirs())

    expect(exitCode).toBe(CONFIG_EXIT_INVALID)
    expect(out.getStderr()).toBe('  Error: Unknown config key: compiler.engine\n')
  })
})

// ---------------------------------------------------------------------------
// config set
// ---------------------------------------------------------------------------

describe('config set', () => {
  it('writes a coerced value to the project config', async () => {
    const out = captureOutput()

    const exitCode = await runConfigSet('compiler.default_runs', '2', dirs())

    expect(exitCode).toBe(CONFIG_EXIT_SUCCESS)
    expect(out.getStdout()).toBe('  Set compiler.default_runs = 2\n')
    const written = yaml.load(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8'))
    expect(written).toEqual({ compiler: { default_runs: 2 } })
  })

  it('keeps existing project keys', async () => {
    await writeConfigYaml('global:\n  work_dir: out\n')
    captureOutput()

    await runConfigSet('global.log_level', 'debug', dirs())

    const written = yaml.load(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8'))
    expect(written).toEqual({ global: { work_dir: 'out', log_level: 'debug' } })
  })

  it('exits 2 for an invalid value', async () => {
    const out = captureOutput()

    const exitCode = await runConfigSet('global.log_level', 'loud', dirs())

    expect(exitCode).toBe(CONFIG_EXIT_INVALID)
    expect(out.getStderr()).toMatch(/^ {2}Error: Invalid value for "global\.log_level":/)
  })

  it('exits 2 for a section key', async () => {
    const out = captureOutput()

    const exitCode = await runConfigSet('compiler', 'x', dirs())

    expect(exitCode).toBe(CONFIG_EXIT_INVALID)
    expect(out.getStderr()).toBe(
      '  Error: Cannot set object key "compiler"; use a more specific dot-notation path\n',
    )
  })

  it('exits 2 for an empty key', async () => {
    const out = captureOutput()

    expect(await runConfigSet('  ', 'x', dirs())).toBe(CONFIG_EXIT_INVALID)
    expect(out.getStderr()).toBe('  Error: key must not be empty\n')
  })
})

// ---------------------------------------------------------------------------
// coerceValue
// ---------------------------------------------------------------------------

describe('coerceValue', () => {
  it('maps literals to booleans, null and numbers', () => {
    expect(coerceValue('true')).toBe(true)
    expect(coerceValue('false')).toBe(false)
    expect(coerceValue('null')).toBeNull()
    expect(coerceValue('-4')).toBe(-4)
    expect(coerceValue('0.5')).toBe(0.5)
  })

  it('keeps other input as trimmed strings', () => {
    expect(coerceValue(' xelatex ')).toBe('xelatex')
    expect(coerceValue('1.2.3')).toBe('1.2.3')
  })
})
