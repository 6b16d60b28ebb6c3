import {detectBoards} from '../../boards/detection.ts'
import type {DetectedBoard} from '../../boards/types.ts'
import {runTool, type ToolRunner} from '../../utils/runTool.ts'
import {resolveToolConfig} from './config.ts'
import type {PrefixLog} from './prefixLog.ts'
import type {CliContext} from './types.ts'

export type Detector = (ctx: CliContext, log: PrefixLog) => DetectedBoard[]

export interface DetectAttachedDeps {
  run?: ToolRunner
  env?: NodeJS.ProcessEnv
}

/**
 * Run board detection with the configured arduino-cli and timeout.
 */
export function detectAttached(ctx: CliContext, log: PrefixLog, deps: DetectAttachedDeps = {}): DetectedBoard[] {
  const {run = runTool, env = process.env} = deps
  const config = resolveToolConfig({arduinoCli: ctx.arduinoCli}, env)
  log.exec(`${config.arduinoCli} board list --format json`)
  return detectBoards({
    command: config.arduinoCli,
    timeoutMs: config.detectTimeoutMs,
    run,
    log: log.prefix('detect'),
  })
}

export function describeDetected({board, port}: DetectedBoard): string {
  return `${board.name} (${board.slug}) on ${port}`
}
