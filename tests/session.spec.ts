import { describe, expect, it } from 'vitest'
import { DEFAULT_INPUT, IDLE_DESCRIPTION, LOADED_DESCRIPTION, StepSession } from '../src/engine/session'

describe('StepSession', () => {
  it('starts idle with no matrix', () => {
    const session = new StepSession()
    expect(session.view()).toEqual({
      status: 'idle',
      matrix: null,
      cursor: null,
      description: IDLE_DESCRIPTION,
      logs: [],
      active: false,
      solution: null,
    })
    expect(session.advance()).toBeNull()
  })

  it('loads a matrix and logs each step description', () => {
    const session = new StepSession()
    expect(session.start(DEFAULT_INPUT)).toEqual({ ok: true })
    expect(session.view()).toMatchObject({
      status: 'running',
      cursor: { row: 0, col: 0 },
      description: LOADED_DESCRIPTION,
      logs: ['Parsed 3 x 4 matrix'],
      active: true,
    })

    session.advance()
    session.advance()
    const view = session.view()
    expect(view.logs).toEqual([
      'Parsed 3 x 4 matrix',
      'Finding pivot in Column 1, at or below Row 1.',
      'Pivot found at (1, 1). No swap needed.',
    ])
    expect(view.description).toBe('Pivot found at (1, 1). No swap needed.')
  })

  it('runs to the end and switches to the finished view', () => {
    const session = new StepSession()
    session.start('1 2 3\n2 4 6')
    const steps = session.runAll()
    expect(steps).toHaveLength(15)
    const view = session.view()
    expect(view.status).toBe('finished')
    expect(view.active).toBe(false)
    expect(view.cursor).toBeNull()
    expect(view.description).toBe('Analysis complete.')
    expect(view.logs).toHaveLength(16)
    expect(view.logs[0]).toBe('Parsed 2 x 3 matrix')
    expect(view.solution).toEqual({ kind: 'infinite', pivots: 1, variables: 2, freeVariables: 1 })
    expect(session.advance()).toBeNull()
    expect(session.view().logs).toHaveLength(16)
  })

  it('reports parse errors without starting a run', () => {
    const session = new StepSession()
    const result = session.start('1 2\n3 four')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.reason).toBe('invalid-token')
      expect(result.error.token).toBe('four')
    }
    expect(session.status).toBe('idle')
    expect(session.description).toBe("Error parsing matrix: Invalid number 'four' at Row 2, Column 2.")
    expect(session.logs).toEqual([session.description])
  })

  it('keeps the parser log lines at the head of the history', () => {
    const session = new StepSession()
    session.start('# c\n1 2')
    expect(session.view().logs).toEqual(['Row 1 read from line 2', 'Parsed 1 x 2 matrix'])
    session.advance()
    expect(session.view().logs).toEqual([
      'Row 1 read from line 2',
      'Parsed 1 x 2 matrix',
      'Finding pivot in Column 1, at or below Row 1.',
    ])
  })

  it('hands out a copy of the solution', () => {
    const session = new StepSession()
    session.start('1 2')
    session.runAll()
    const solution = session.view().solution
    if (solution) solution.kind = 'none'
    expect(session.view().solution?.kind).toBe('unique')
  })

  it('passes parse options through', () => {
    const session = new StepSession({ parse: { commentPrefix: ';' } })
    expect(session.start('; header\n2 4').ok).toBe(true)
    expect(session.options.decimals).toBe(2)
    expect(session.view().matrix).toEqual([[2, 4]])
  })

  it('discards everything on reset', () => {
    const session = new StepSession()
    session.start(DEFAULT_INPUT)
    session.advance()
    session.reset()
    expect(session.view()).toMatchObject({ status: 'idle', matrix: null, logs: [], description: IDLE_DESCRIPTION })
    session.reset()
    expect(session.status).toBe('idle')
  })

  it('does not let callers mutate the engine through the view', () => {
    const session = new StepSession()
    session.start('2 4')
    const first = session.view()
    first.matrix?.[0].splice(0, 1, 100)
    expect(session.view().matrix).toEqual([[2, 4]])
  })
})
