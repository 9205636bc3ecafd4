import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { writeSource, sourcePathFor } from '../source-writer.js'

let workRoot: string

beforeEach(async () => {
  workRoot = await mkdtemp(join(tmpdir(), 'texsmith-source-writer-'))
})

afterEach(async () => {
  await rm(workRoot, { recursive: true, force: true })
})

describe('sourcePathFor', () => {
  it('joins the work dir and jobname with the .tex extension', () => {
    expect(sourcePathFor('report', '/work')).toBe('/work/report.tex')
  })
})

describe('writeSource', () => {
  it('writes the text verbatim and returns the absolute path', async () => {
    const text = '\\documentclass{article}\n\\begin{document}\nÜber\n\\end{document}\n'
    const path = await writeSource(text, 'report', workRoot)

    expect(path).toBe(join(workRoot, 'report.tex'))
    expect(await readFile(path, 'utf-8')).toBe(text)
  })

  it('creates the work directory when it does not exist', async () => {
    const nested = join(workRoot, 'a', 'b')
    const path = await writeSource('x', 'doc', nested)
    expect(await readFile(path, 'utf-8')).toBe('x')
  })

  it('overwrites an existing source with the same jobname', async () => {
    await writeSource('first', 'same', workRoot)
    const path = await writeSource('second', 'same', workRoot)
    expect(await readFile(path, 'utf-8')).toBe('second')
  })

  it('writes empty text', async () => {
    const path = await writeSource('', 'empty', workRoot)
    expect(await readFile(path, 'utf-8')).toBe('')
  })
})
