/**
 * Phase graph file and string parser.
 *
 * Returns raw parsed objects (before zod validation). Format comes from the
 * file extension, or is given explicitly for strings.
 */

import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import { load as parse } from 'js-yaml'
import { ParseError, toError } from '../../core/errors.js'

export type GraphFormat = 'yaml' | 'json'

export function detectFormat(filePath: string): GraphFormat {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml'
}

/**
 * Parse a graph definition from a string.
 * @throws {ParseError} on syntax errors
 */
export function parseGraphString(content: string, format: GraphFormat): unknown {
  if (format === 'json') {
    try {
      return JSON.parse(content) as unknown
    } catch (err) {
      const original = toError(err)
      throw new ParseError(`JSON parse error: ${original.message}`, {
        format: 'json',
        originalError: original,
      })
    }
  }

  try {
    return parse(content)
  } catch (err) {
    const original = toError(err)
    throw new ParseError(`YAML parse error: ${original.message}`, {
      format: 'yaml',
      originalError: original,
    })
  }
}

/**
 * Read and parse a graph definition file.
 * @throws {ParseError} on read or syntax errors
 */
export function parseGraphFile(filePath: string): unknown {
  let content: string
  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    const original = toError(err)
    throw new ParseError(`Failed to read file: ${original.message}`, {
      filePath,
      originalError: original,
    })
  }

  try {
    return parseGraphString(content, detectFormat(filePath))
  } catch (err) {
    if (err instanceof ParseError) {
      throw new ParseError(err.message, {
        filePath,
        format: err.format,
        originalError: err.originalError,
      })
    }
    throw err
  }
}
