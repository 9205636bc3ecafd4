/**
 * Persists document source text into the work directory.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'

/** Extension of persisted source files */
export const SOURCE_EXTENSION = '.tex'

/** Extension of the compiled artifact */
export const ARTIFACT_EXTENSION = '.pdf'

/**
 * Absolute path of the source file for `jobname` inside `workDir`.
 */
export function sourcePathFor(jobname: string, workDir: string): string {
  return join(resolve(workDir), `${jobname}${SOURCE_EXTENSION}`)
}

/**
 * Write `sourceText` verbatim (UTF-8) to `workDir/{jobname}.tex`.
 *
 * Creates `workDir` if needed and overwrites any existing file of the same
 * name. The content is not inspected.
 *
 * @returns Absolute path of the written file
 */
export async function writeSource(
  sourceText: string,
  jobname: string,
  workDir: string,
): Promise<string> {
  await mkdir(resolve(workDir), { recursive: true })
  const sourcePath = sourcePathFor(jobname, workDir)
  await writeFile(sourcePath, sourceText, 'utf-8')
  return sourcePath
}
