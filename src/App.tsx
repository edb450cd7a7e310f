// RREF Stepper

import React, { useState } from 'react'
import { Activity, Play, RotateCcw, SkipForward, StepForward } from 'lucide-react'
import InputPane from './components/InputPane'
import MatrixView from './components/MatrixView'
import StepLog from './components/StepLog'
import { DEFAULT_INPUT, StepSession } from './engine/session'
import type { SessionView } from './types'

const App: React.FC = () => {
  const [session] = useState(() => new StepSession())
  const [input, setInput] = useState<string>(DEFAULT_INPUT)
  const [view, setView] = useState<SessionView>(() => session.view())

  const refresh = () => setView(session.view())

  const handleStart = () => {
    session.start(input)
    refresh()
  }

  const handleNext = () => {
    session.advance()
    refresh()
  }

  const handleFinish = () => {
    session.runAll()
    refresh()
  }

  const handleReset = () => {
    session.reset()
    setInput(DEFAULT_INPUT)
    refresh()
  }

  const running = view.status === 'running'

  return (
    <div className="fixed inset-0 flex flex-col bg-slate-900 text-slate-100 font-sans overflow-hidden">
      <header className="h-16 bg-slate-800 border-b border-slate-700 flex items-center justify-between px-4 shrink-0 w-full">
        <div className="flex items-center space-x-2">
          <Activity className="text-blue-400" size={24} />
          <div className="flex flex-col">
            <h1 className="text-lg font-bold tracking-wide text-white leading-none">
              RREF <span className="text-blue-400 font-light">Stepper</span>
            </h1>
            <span className="text-xs text-slate-500">Gauss-Jordan elimination, one step at a time</span>
          </div>
        </div>

        <div className="flex space-x-2">
          <button
            onClick={handleStart}
            disabled={view.status !== 'idle'}
            className="flex items-center space-x-2 bg-green-600 hover:bg-green-500 disabled:opacity-40 text-white px-4 py-1.5 rounded text-sm font-medium transition-colors"
          >
            <Play size={16} /> <span>Start</span>
          </button>
          <button
            onClick={handleNext}
            disabled={!running}
            className="flex items-center space-x-2 bg-blue-600 hover:bg-blue-500 disabled:opacity-40 text-white px-4 py-1.5 rounded text-sm font-medium transition-colors"
          >
            <StepForward size={16} /> <span>Next Step</span>
          </button>
          <button
            onClick={handleFinish}
            disabled={!running}
            title="Run to the end"
            className="p-2 bg-slate-700 hover:bg-slate-600 disabled:opacity-40 rounded text-slate-300 transition-colors"
          >
            <SkipForward size={18} />
          </button>
          <button
            onClick={handleReset}
            disabled={view.status === 'idle'}
            title="Reset"
            className="p-2 bg-slate-700 hover:bg-slate-600 disabled:opacity-40 rounded text-slate-300 transition-colors"
          >
            <RotateCcw size={18} />
          </button>
        </div>
      </header>

      <div className="flex-1 flex overflow-hidden w-full">
        <div style={{ width: '30%' }}>
          <InputPane input={input} disabled={view.status !== 'idle'} onChange={setInput} />
        </div>

        <div className="flex flex-col bg-slate-950 flex-1 min-w-0 overflow-hidden">
          {view.matrix ? (
            <MatrixView
              matrix={view.matrix}
              cursor={view.cursor}
              active={view.active}
              decimals={session.options.decimals}
            />
          ) : (
            <div className="flex flex-col items-center justify-center flex-1 text-slate-500 space-y-4">
              <Activity size={48} className="opacity-20" />
            </div>
          )}
          <StepLog description={view.description} logs={view.logs} solution={view.solution} />
        </div>
      </div>
    </div>
  )
}

export default App
