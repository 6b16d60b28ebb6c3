/**
 * CLI logging via proc-log.
 *
 * proc-log emits `log` events on process instead of writing anywhere itself.
 * The CLI attaches a listener in program.ts; tests attach their own to capture
 * output, and nothing is printed when no one listens.
 */
import procLog from 'proc-log'

export default {
  info: (...args: unknown[]) => procLog.log.info(...args),
  warn: (...args: unknown[]) => procLog.log.warn(...args),
  error: (...args: unknown[]) => procLog.log.error(...args),
  // Only shown with --log-level verbose
  verbose: (...args: unknown[]) => procLog.log.verbose(...args),
  silly: (...args: unknown[]) => procLog.log.silly(...args),
}
