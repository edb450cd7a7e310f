import React from 'react'
import { AlertTriangle, CheckCircle, Info } from 'lucide-react'
import type { SolutionSummary } from '../types'

interface StepLogProps {
  description: string
  logs: string[]
  solution: SolutionSummary | null
}

const SolutionBadge: React.FC<{ solution: SolutionSummary }> = ({ solution }) => {
  if (solution.kind === 'none') {
    return (
      <span className="flex items-center space-x-1 text-red-400">
        <AlertTriangle size={14} /> <span>No solution</span>
      </span>
    )
  }
  if (solution.kind === 'not-applicable') {
    return (
      <span className="flex items-center space-x-1 text-slate-400">
        <Info size={14} /> <span>Not an augmented system</span>
      </span>
    )
  }
  return (
    <span className="flex items-center space-x-1 text-green-400">
      <CheckCircle size={14} />{' '}
      <span>
        {solution.kind === 'unique'
          ? `Unique solution (${solution.pivots}/${solution.variables} pivots)`
          : `Infinite solutions (${solution.freeVariables} free)`}
      </span>
    </span>
  )
}

const StepLog: React.FC<StepLogProps> = ({ description, logs, solution }) => {
  return (
    <div className="flex flex-col border-t border-slate-800 min-h-0 flex-1">
      <div className="bg-slate-900 px-4 py-3 text-sm text-white flex justify-between items-center">
        <span>{description}</span>
        {solution && <SolutionBadge solution={solution} />}
      </div>
      <ol className="flex-1 overflow-auto px-4 py-2 font-mono text-xs text-slate-400 list-decimal list-inside">
        {logs.map((line, i) => (
          <li key={i} className={i === logs.length - 1 ? 'text-slate-200' : ''}>
            {line}
          </li>
        ))}
      </ol>
    </div>
  )
}

export default StepLog
