/**
 * Job name derivation.
 *
 * A job name becomes a file stem inside the shared work directory, so every
 * name (caller-supplied or generated) is reduced to `[A-Za-z0-9_-]` before use.
 */

import { randomBytes } from 'node:crypto'

/** Fallback used when sanitizing leaves nothing behind */
export const DEFAULT_JOBNAME = 'document'

/** Prefix for generated job names */
export const GENERATED_JOBNAME_PREFIX = 'doc_'

/**
 * Return a filesystem-friendly job name.
 *
 * Every character outside `[A-Za-z0-9_-]` becomes `_`, then leading and
 * trailing `.`/`_` are stripped. Never returns an empty string.
 *
 * @example
 * sanitizeJobname('My Doc!') // 'My_Doc'
 * sanitizeJobname('..doc..') // 'doc'
 */
export function sanitizeJobname(value: string): string {
  const replaced = value.replace(/[^A-Za-z0-9_-]/g, '_')
  const stripped = replaced.replace(/^[._]+/, '').replace(/[._]+$/, '')
  return stripped === '' ? DEFAULT_JOBNAME : stripped
}

/**
 * Generate a random job name such as `doc_3fa94c1e`.
 */
export function generateJobname(): string {
  return `${GENERATED_JOBNAME_PREFIX}${randomBytes(4).toString('hex')}`
}
