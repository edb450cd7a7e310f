import React from 'react'
import { cellHighlight, formatGrid } from '../engine/display'
import type { CellHighlight, PivotCursor } from '../types'

interface MatrixViewProps {
  matrix: number[][]
  cursor: PivotCursor | null
  active: boolean
  decimals: number
}

const CELL_CLASS: Record<CellHighlight, string> = {
  pivot: 'bg-amber-400 text-slate-900 font-bold',
  'pivot-row': 'bg-cyan-900/60 text-cyan-100',
  'pivot-col': 'bg-cyan-900/60 text-cyan-100',
  constant: 'bg-green-800/60 text-green-100',
  'leading-one': 'bg-blue-800/60 text-blue-100 font-bold',
  none: 'bg-slate-800 text-slate-300',
}

const MatrixView: React.FC<MatrixViewProps> = ({ matrix, cursor, active, decimals }) => {
  const cols = matrix[0]?.length ?? 0
  const ctx = { active, cursor, cols }
  const text = formatGrid(matrix, decimals)

  return (
    <div className="p-6 overflow-auto">
      <table className="font-mono text-sm border-separate border-spacing-2">
        <tbody>
          {matrix.map((row, r) => (
            <tr key={r}>
              {row.map((value, c) => (
                <td
                  key={c}
                  className={`min-w-[60px] px-3 py-2 text-center rounded ${CELL_CLASS[cellHighlight(ctx, r, c, value)]} ${
                    cols > 1 && c === cols - 1 ? 'border-l-2 border-slate-500' : ''
                  }`}
                >
                  {text[r][c]}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}

export default MatrixView
