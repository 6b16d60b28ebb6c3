/**
 * CLI context passed to all command handlers
 */
export interface CliContext {
  /** The CLI name (e.g., 'boardcraft') */
  cliName: string
  /** The current working directory, where instruction files are written */
  cwd: string
  /** Where command results (tables, JSON) are written */
  stdout: NodeJS.WritableStream
  /** Output as JSON (--json) */
  json?: boolean
  /** arduino-cli executable override (--arduino-cli) */
  arduinoCli?: string
}

/**
 * Type for CLI command functions
 * All commands receive CliContext as first argument and return Promise<void>
 */
export type CliCommand<Args extends unknown[] = []> = (ctx: CliContext, ...args: Args) => Promise<void>
