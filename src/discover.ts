import fg from 'fast-glob'
import type { Stats } from 'node:fs'
import { readFile, stat } from 'node:fs/promises'
import { resolve } from 'node:path'
import { type CueSheet, decodeCue, parseCue } from './cue'
import { ConfigError, ParseError } from './errors'

/**
 * Returns `path` itself when it names a file, or every `.cue` file below
 * it (hidden directories included), sorted. Directories whose name ends
 * in `.cue` are searched, never returned.
 */
export async function findCueFiles(path: string): Promise<string[]> {
  let info: Stats
  try {
    info = await stat(path)
  } catch (error) {
    throw new ConfigError(`file or directory does not exist: ${path}`, {
      cause: error,
    })
  }

  if (!info.isDirectory()) {
    return [resolve(path)]
  }

  const found = await fg('**/*.cue', {
    cwd: resolve(path),
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
    dot: true,
    followSymbolicLinks: true,
  })
  return found.map((entry) => resolve(entry)).sort()
}

/**
 * Reads, decodes and parses one cuesheet. Parse errors keep their line
 * number and gain the file name.
 */
export async function readCueSheet(
  cueFilePath: string,
  encoding?: string
): Promise<CueSheet> {
  const data = await readFile(cueFilePath)
  try {
    return parseCue(decodeCue(data, encoding))
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ParseError(
        error.line,
        `${cueFilePath}: ${error.reason}`,
        error.text
      )
    }
    throw error
  }
}
