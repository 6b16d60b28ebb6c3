// proc-log ships no type declarations
declare module 'proc-log' {
  type LogFn = (...args: unknown[]) => void
  const procLog: {
    log: {
      error: LogFn
      warn: LogFn
      notice: LogFn
      http: LogFn
      info: LogFn
      verbose: LogFn
      silly: LogFn
    }
  }
  export default procLog
}
