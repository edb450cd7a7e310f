import { MatrixValidationError } from './errors'
import type { ParseOptions, ParseResult } from '../types'

export const defaultParseOptions: ParseOptions = {
  commentPrefix: '#',
}

const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const parseToken = (token: string): number => {
  if (!NUMBER_RE.test(token)) return Number.NaN
  return Number(token)
}

/**
 * Reads an augmented matrix typed one row per line, values separated by
 * whitespace. Blank lines and comment lines are ignored. Throws
 * MatrixValidationError on the first problem found; positions in the error
 * are 1-based and count data rows only.
 */
export const parseMatrix = (input: string, opts: Partial<ParseOptions> = {}): ParseResult => {
  const state: ParseOptions = { ...defaultParseOptions, ...opts }
  const logs: string[] = []
  const values: number[][] = []

  const lines = input.split(/\r\n|\r|\n/)
  let lineNum = 0

  for (const raw of lines) {
    lineNum += 1
    const line = raw.trim()
    if (!line) continue
    if (state.commentPrefix && line.startsWith(state.commentPrefix)) continue

    const parts = line.split(/\s+/)
    const row = values.length + 1
    const expected = values[0]?.length ?? parts.length
    if (parts.length !== expected) {
      throw new MatrixValidationError(
        'column-count',
        `Row ${row} has ${parts.length} columns, but expected ${expected}.`,
        { row, expected, actual: parts.length },
      )
    }

    const parsed = parts.map((token, i) => {
      const v = parseToken(token)
      if (!Number.isFinite(v)) {
        throw new MatrixValidationError(
          'invalid-token',
          `Invalid number '${token}' at Row ${row}, Column ${i + 1}.`,
          { row, column: i + 1, token },
        )
      }
      return v
    })
    values.push(parsed)
    if (row !== lineNum) logs.push(`Row ${row} read from line ${lineNum}`)
  }

  if (values.length === 0) {
    throw new MatrixValidationError('empty', 'No rows found.')
  }

  const rows = values.length
  const cols = values[0].length
  logs.push(`Parsed ${rows} x ${cols} matrix`)

  return { rows, cols, values, logs }
}
