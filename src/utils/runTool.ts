import {spawnSync} from 'node:child_process'

export interface ToolResult {
  /** Exit code, or null when the process was killed or never started */
  status: number | null
  stdout: string
  stderr: string
  /** Set when the process could not be launched or hit the timeout */
  error?: Error
}

export interface ToolOptions {
  timeoutMs?: number
  cwd?: string
}

/**
 * Runs an external command to completion. Never throws: launch failures and
 * timeouts are reported through `error` on the result.
 */
export type ToolRunner = (command: string, args: string[], options?: ToolOptions) => ToolResult

export const runTool: ToolRunner = (command, args, options = {}) => {
  const result = spawnSync(command, args, {
    cwd: options.cwd,
    timeout: options.timeoutMs,
    encoding: 'utf-8',
    windowsHide: true,
  })

  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    error: result.error,
  }
}

/**
 * Whether a finished tool run succeeded (launched, no timeout, exit code 0).
 */
export function succeeded(result: ToolResult): boolean {
  return !result.error && result.status === 0
}
