import { describe, expect, it } from 'vitest'
import { cellHighlight, formatCell, formatGrid } from '../src/engine/display'
import { cleanZero, EPSILON, isOne, isZero } from '../src/engine/numeric'

describe('numeric tolerance', () => {
  it('compares against a fixed epsilon', () => {
    expect(EPSILON).toBe(1e-9)
    expect(isZero(5e-10)).toBe(true)
    expect(isZero(-2e-9)).toBe(false)
    expect(isOne(1 + 5e-10)).toBe(true)
    expect(isOne(1.001)).toBe(false)
  })

  it('cleans near-zero values to exactly zero', () => {
    expect(cleanZero(1e-12)).toBe(0)
    expect(Object.is(cleanZero(-0), 0)).toBe(true)
    expect(cleanZero(0.5)).toBe(0.5)
  })
})

describe('formatCell', () => {
  it('formats with two decimals by default', () => {
    expect(formatCell(3)).toBe('3.00')
    expect(formatCell(-0.5)).toBe('-0.50')
    expect(formatCell(1 / 3, 4)).toBe('0.3333')
  })

  it('never shows a negative zero', () => {
    expect(formatCell(-1e-12)).toBe('0.00')
    expect(formatCell(-0.001)).toBe('0.00')
    expect(formatCell(-0)).toBe('0.00')
  })

  it('formats a whole grid', () => {
    expect(
      formatGrid([
        [1, -2.5],
        [1e-15, 10],
      ]),
    ).toEqual([
      ['1.00', '-2.50'],
      ['0.00', '10.00'],
    ])
  })
})

describe('cellHighlight', () => {
  const running = { active: true, cursor: { row: 1, col: 2 }, cols: 4 }
  const finished = { active: false, cursor: null, cols: 4 }

  it('marks the pivot cell, row and column while running', () => {
    expect(cellHighlight(running, 1, 2, 5)).toBe('pivot')
    expect(cellHighlight(running, 1, 0, 5)).toBe('pivot-row')
    expect(cellHighlight(running, 0, 2, 5)).toBe('pivot-col')
    expect(cellHighlight(running, 0, 3, 1)).toBe('none')
  })

  it('marks the constants column and leading ones after completion', () => {
    expect(cellHighlight(finished, 0, 3, 7)).toBe('constant')
    expect(cellHighlight(finished, 0, 3, 1)).toBe('constant')
    expect(cellHighlight(finished, 0, 0, 1)).toBe('leading-one')
    expect(cellHighlight(finished, 0, 1, 1 + 1e-12)).toBe('leading-one')
    expect(cellHighlight(finished, 0, 1, 0)).toBe('none')
  })

  it('has no constants column for a single-column matrix', () => {
    const single = { active: false, cursor: null, cols: 1 }
    expect(cellHighlight(single, 0, 0, 1)).toBe('none')
  })
})
