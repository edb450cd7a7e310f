import { describe, it, expect } from 'vitest'
import fs from 'fs'
import path from 'path'
import { parseMatrix } from '../src/engine/parse'
import { Matrix } from '../src/engine/matrix'
import { runToCompletion } from '../src/engine/rref'
import { MatrixValidationError } from '../src/engine/errors'

const load = (name: string) => fs.readFileSync(path.join(process.cwd(), 'tests/fixtures', name), 'utf-8')

const solve = (name: string) => {
  const parsed = parseMatrix(load(name))
  return runToCompletion(Matrix.fromRows(parsed.values))
}

describe('Example systems', () => {
  it('solves unique.txt to x=1, y=2, z=3', () => {
    const run = solve('unique.txt')
    expect(run.solution?.kind).toBe('unique')
    run.matrix.forEach((row, r) => {
      expect(row[3]).toBeCloseTo(r + 1, 9)
      row.slice(0, 3).forEach((v, c) => expect(v).toBeCloseTo(r === c ? 1 : 0, 9))
    })
  })

  it('classifies dependent.txt as having infinitely many solutions', () => {
    const run = solve('dependent.txt')
    expect(run.solution).toMatchObject({ kind: 'infinite', freeVariables: 1 })
    expect(run.matrix[1].every((v) => Math.abs(v) < 1e-9)).toBe(true)
  })

  it('classifies inconsistent.txt as having no solution', () => {
    const run = solve('inconsistent.txt')
    expect(run.solution).toMatchObject({ kind: 'none', contradictionRow: 1 })
    expect(run.steps[run.steps.length - 1].kind).toBe('NoSolution')
  })

  it('rejects ragged.txt before any stepping', () => {
    expect(() => parseMatrix(load('ragged.txt'))).toThrow(MatrixValidationError)
  })
})
