import {findBoard, getBoardByFqbn} from './registry.ts'
import {lookupBridge} from './usbBridges.ts'
import type {DetectedBoard} from './types.ts'
import {isRecord} from '../utils/isRecord.ts'
import {runTool, succeeded, type ToolResult, type ToolRunner} from '../utils/runTool.ts'

export const DEFAULT_ARDUINO_CLI = 'arduino-cli'
export const DEFAULT_DETECT_TIMEOUT_MS = 10_000

interface DetectionLog {
  verbose(message: string): void
}

export interface DetectOptions {
  /** arduino-cli executable (name on PATH or absolute path) */
  command?: string
  timeoutMs?: number
  run?: ToolRunner
  log?: DetectionLog
}

function stringField(record: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = record?.[key]
  return typeof value === 'string' && value !== '' ? value : undefined
}

function listField(record: Record<string, unknown>, key: string): unknown[] {
  const value = record[key]
  return Array.isArray(value) ? value : []
}

/**
 * Port records from `board list --format json`.
 * Current arduino-cli wraps them in {detected_ports: [...]}, older releases print a bare array.
 */
function portEntries(parsed: unknown): unknown[] | undefined {
  if (Array.isArray(parsed)) return parsed
  if (isRecord(parsed)) return listField(parsed, 'detected_ports')
  return undefined
}

function resolvePort(entry: unknown, log?: DetectionLog): DetectedBoard[] {
  if (!isRecord(entry)) return []
  const port = isRecord(entry.port) ? entry.port : undefined
  const address = stringField(port, 'address') ?? stringField(entry, 'address')
  if (!address) return []

  // A board identified by arduino-cli always wins over the USB ID guess
  const candidates = [...listField(entry, 'matching_boards'), ...listField(entry, 'boards')]
  for (const candidate of candidates) {
    if (!isRecord(candidate)) continue
    const fqbn = stringField(candidate, 'fqbn') ?? stringField(candidate, 'FQBN')
    if (!fqbn) continue
    const board = getBoardByFqbn(fqbn)
    if (board) {
      log?.verbose(`${address}: matched ${board.slug} by fqbn ${fqbn}`)
      return [{board, port: address}]
    }
    log?.verbose(`${address}: fqbn ${fqbn} is not a supported board`)
  }

  const rawProperties = port?.properties ?? entry.properties
  const properties = isRecord(rawProperties) ? rawProperties : undefined
  const vid = stringField(properties, 'vid')
  const pid = stringField(properties, 'pid')
  if (!vid || !pid) {
    log?.verbose(`${address}: no usb vid/pid, skipping`)
    return []
  }

  const bridge = lookupBridge(vid, pid)
  if (!bridge) {
    log?.verbose(`${address}: unknown usb device ${vid}:${pid}, skipping`)
    return []
  }

  log?.verbose(`${address}: ${bridge.chip} (${vid}:${pid}) suggests ${bridge.slugs.join(', ')}`)
  return bridge.slugs.flatMap(slug => {
    const board = findBoard(slug)
    return board ? [{board, port: address}] : []
  })
}

/**
 * Parse `arduino-cli board list --format json` output into detected boards.
 * Malformed output yields an empty list.
 */
export function parseBoardList(stdout: string, log?: DetectionLog): DetectedBoard[] {
  let parsed: unknown
  try {
    parsed = JSON.parse(stdout)
  } catch (error) {
    log?.verbose(`board list output is not JSON: ${(error as Error).message}`)
    return []
  }

  const entries = portEntries(parsed)
  if (!entries) {
    log?.verbose('board list output has no port records')
    return []
  }

  return entries.flatMap(entry => resolvePort(entry, log))
}

/**
 * Ask arduino-cli which boards are attached and map them to supported boards.
 * Detection is best effort: a missing tool, failed run, timeout or unreadable
 * output all produce an empty list rather than an error.
 */
export function detectBoards(options: DetectOptions = {}): DetectedBoard[] {
  const {command = DEFAULT_ARDUINO_CLI, timeoutMs = DEFAULT_DETECT_TIMEOUT_MS, run = runTool, log} = options
  const args = ['board', 'list', '--format', 'json']

  let result: ToolResult
  try {
    result = run(command, args, {timeoutMs})
  } catch (error) {
    log?.verbose(`${command} could not be run: ${(error as Error).message}`)
    return []
  }

  if (!succeeded(result)) {
    const reason = result.error ? result.error.message : `exit code ${result.status}`
    log?.verbose(`${command} ${args.join(' ')} failed: ${reason}`)
    return []
  }

  return parseBoardList(result.stdout, log)
}
