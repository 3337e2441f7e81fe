import { createStore } from 'zustand/vanilla'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogSource = 'noise' | 'circuit'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export type LogMeta = Record<string, unknown>

export type LogLine = {
  id: string
  ts: string
  level: LogLevel
  source: LogSource
  message: string
  meta?: LogMeta
}

export const DEFAULT_MAX_LINES = 2000

function nowIso() {
  return new Date().toISOString()
}

let seq = 0
function newId() {
  seq += 1
  return `log_${Date.now().toString(36)}_${seq.toString(36)}`
}

function rank(level: LogLevel) {
  return LOG_LEVELS.indexOf(level)
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(l => l === value)
}

type LogState = {
  lines: LogLine[]
  minLevel: LogLevel
  maxLines: number
  echo: boolean

  log: (source: LogSource, message: string, level?: LogLevel, meta?: LogMeta) => void
  clear: () => void
  setMinLevel: (level: LogLevel) => void
  setMaxLines: (n: number) => void
  setEcho: (on: boolean) => void
}

function echoLine(line: LogLine) {
  const text = `[${line.ts}] ${line.level.toUpperCase()} ${line.source}: ${line.message}`
  const args: unknown[] = line.meta ? [text, line.meta] : [text]
  if (line.level === 'error') console.error(...args)
  else if (line.level === 'warn') console.warn(...args)
  else console.log(...args)
}

export const logStore = createStore<LogState>((set, get) => {
  const push = (arr: LogLine[], line: LogLine, max: number) => {
    const next = [...arr, line]
    if (next.length > max) return next.slice(next.length - max)
    return next
  }

  return {
    lines: [],
    minLevel: 'info',
    maxLines: DEFAULT_MAX_LINES,
    echo: false,

    log: (source, message, level = 'info', meta) => {
      const { minLevel, maxLines, echo } = get()
      if (rank(level) < rank(minLevel)) return
      const line: LogLine = { id: newId(), ts: nowIso(), level, source, message, meta }
      set(state => ({ lines: push(state.lines, line, maxLines) }))
      if (echo) echoLine(line)
    },

    clear: () => set({ lines: [] }),

    setMinLevel: (level) => set({ minLevel: level }),

    setMaxLines: (n) => {
      const max = Math.max(1, Math.floor(n))
      set(state => ({
        maxLines: max,
        lines: state.lines.length > max ? state.lines.slice(state.lines.length - max) : state.lines,
      }))
    },

    setEcho: (on) => set({ echo: on }),
  }
})

// Convenience helpers for call sites outside the stores.
export const logNoise = (message: string, level: LogLevel = 'info', meta?: LogMeta) => {
  try {
    logStore.getState().log('noise', message, level, meta)
  } catch (e) {
    console.error('log store unavailable', e)
  }
}

export const logCircuit = (message: string, level: LogLevel = 'info', meta?: LogMeta) => {
  try {
    logStore.getState().log('circuit', message, level, meta)
  } catch (e) {
    console.error('log store unavailable', e)
  }
}
