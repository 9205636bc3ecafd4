import { describe, it, expect } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { errorMessage, fileExists, formatDuration, isPlainObject } from '../helpers.js'

describe('formatDuration', () => {
  it('formats sub-second, second and minute ranges', () => {
    expect(formatDuration(250)).toBe('250ms')
    expect(formatDuration(1500)).toBe('1.5s')
    expect(formatDuration(125000)).toBe('2m 5s')
  })
})

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects only', () => {
    expect(isPlainObject({ a: 1 })).toBe(true)
    expect(isPlainObject(Object.create(null))).toBe(true)
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(null)).toBe(false)
    expect(isPlainObject(new Date())).toBe(false)
    expect(isPlainObject('text')).toBe(false)
  })
})

describe('errorMessage', () => {
  it('uses Error.message and stringifies anything else', () => {
    expect(errorMessage(new Error('nope'))).toBe('nope')
    expect(errorMessage(42)).toBe('42')
  })
})

describe('fileExists', () => {
  it('reports files and directories that exist', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'texsmith-helpers-'))
    try {
      await writeFile(join(dir, 'a.tex'), '')
      expect(await fileExists(join(dir, 'a.tex'))).toBe(true)
      expect(await fileExists(dir)).toBe(true)
      expect(await fileExists(join(dir, 'missing.tex'))).toBe(false)
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})
