import {cyan, magenta, dim, green, yellow, red, blue} from './colors.ts'
import log from './log.ts'

/**
 * Structured prefix logger (npm-style).
 * Builds up context segments that prefix every log line.
 *
 * Usage:
 *   const l = createPrefixLog('boardcraft', 'init')
 *   l.info('Board: ESP32')                 // boardcraft info init Board: ESP32
 *   l.prefix('detect').verbose('probing')  // boardcraft verbose init detect probing
 */
export interface PrefixLog {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  verbose(message: string): void
  exec(message: string): void
  fs(message: string): void
  prefix(segment: string): PrefixLog
}

type Level = 'info' | 'warn' | 'error' | 'verbose' | 'exec' | 'fs'

function formatSegment(seg: string, position: number): string {
  if (position === 0) return cyan(seg)
  if (position === 1) return magenta(seg)
  // device paths stand out, phase names are dimmed
  return seg.startsWith('/') ? seg : dim(seg)
}

function levelColor(level: Level): string {
  switch (level) {
    case 'info':
      return green(level)
    case 'warn':
      return yellow(level)
    case 'error':
      return red(level)
    case 'verbose':
      return dim(level)
    case 'exec':
      return blue(level)
    case 'fs':
      return yellow(level)
  }
}

function createLogger(segments: string[]): PrefixLog {
  function emit(level: Level, message: string): void {
    // colored level goes right after the cli name
    const parts = segments.map(formatSegment)
    parts.splice(segments.length > 0 ? 1 : 0, 0, levelColor(level))
    // exec and fs lines are informational
    const transport = level === 'exec' || level === 'fs' ? 'info' : level
    log[transport](`${parts.join(' ')} ${message}`)
  }

  return {
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
    verbose: message => emit('verbose', message),
    exec: message => emit('exec', message),
    fs: message => emit('fs', message),
    prefix: segment => createLogger([...segments, segment]),
  }
}

export function createPrefixLog(...segments: string[]): PrefixLog {
  return createLogger(segments)
}
