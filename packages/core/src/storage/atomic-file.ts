/**
 * Atomic JSON files
 *
 * Writes go to a temp file beside the target, are fsynced, then renamed
 * over the target, so a concurrent reader sees either the old or the new
 * document and never a partial one.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'fs'
import { dirname } from 'path'
import { randomBytes } from 'crypto'

/**
 * Write `value` as JSON to `filePath` atomically.
 */
export function writeJsonAtomic(filePath: string, value: unknown): void {
  const dir = dirname(filePath)
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }

  const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  const fd = openSync(tempPath, 'w')
  try {
    writeFileSync(fd, JSON.stringify(value, null, 2))
    fsyncSync(fd)
  } catch (error) {
    closeSync(fd)
    removeFile(tempPath)
    throw error
  }
  closeSync(fd)

  try {
    renameSync(tempPath, filePath)
  } catch (error) {
    removeFile(tempPath)
    throw error
  }
}

export type JsonReadResult =
  | { kind: 'missing' }
  | { kind: 'ok'; value: unknown; size: number }
  | { kind: 'too_large'; size: number }
  | { kind: 'unparseable'; error: Error }

/**
 * Read and parse a JSON file without throwing.
 *
 * @param maxBytes - files larger than this are reported as too_large unread
 */
export function readJsonFile(filePath: string, maxBytes?: number): JsonReadResult {
  let size: number
  try {
    size = statSync(filePath).size
  } catch (error) {
    if (isNotFound(error)) return { kind: 'missing' }
    return { kind: 'unparseable', error: toError(error) }
  }

  if (maxBytes !== undefined && size > maxBytes) {
    return { kind: 'too_large', size }
  }

  try {
    const content = readFileSync(filePath, 'utf-8')
    const value: unknown = JSON.parse(content)
    return { kind: 'ok', value, size }
  } catch (error) {
    if (isNotFound(error)) return { kind: 'missing' }
    return { kind: 'unparseable', error: toError(error) }
  }
}

/**
 * Delete a file if it exists. Returns true when something was removed.
 */
export function removeFile(filePath: string): boolean {
  try {
    unlinkSync(filePath)
    return true
  } catch (error) {
    if (isNotFound(error)) return false
    throw error
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
