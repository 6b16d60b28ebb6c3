import boardData from './boards.json'
import {NotFoundError} from '../utils/NotFoundError.ts'
import {isRecord} from '../utils/isRecord.ts'
import type {BoardDefinition} from './types.ts'

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

function requireString(record: Record<string, unknown>, key: string, label: string, allowEmpty = false): string {
  const value = record[key]
  if (typeof value !== 'string' || (!allowEmpty && value.trim() === '')) {
    throw new Error(`Board ${label}: "${key}" must be a ${allowEmpty ? 'string' : 'non-empty string'}`)
  }
  return value
}

function requireNonEmptyList(record: Record<string, unknown>, key: string, label: string): string[] {
  const value = record[key]
  if (!isStringList(value) || value.length === 0) {
    throw new Error(`Board ${label}: "${key}" must be a non-empty list of strings`)
  }
  return value
}

function parseBoard(raw: unknown, index: number): BoardDefinition {
  if (!isRecord(raw)) {
    throw new Error(`Board #${index}: must be an object`)
  }

  const slug = requireString(raw, 'slug', `#${index}`)
  const label = `"${slug}"`
  const name = requireString(raw, 'name', label)
  const fqbn = requireString(raw, 'fqbn', label)
  if (fqbn.split(':').length < 3) {
    throw new Error(`Board ${label}: fqbn "${fqbn}" must have at least 3 colon-separated parts`)
  }
  const coreId = requireString(raw, 'coreId', label)
  const corePackageUrl = requireString(raw, 'corePackageUrl', label, true)

  const baudRate = raw.baudRate
  if (typeof baudRate !== 'number' || !Number.isInteger(baudRate) || baudRate <= 0) {
    throw new Error(`Board ${label}: "baudRate" must be a positive integer`)
  }

  const capabilities = raw.capabilities ?? []
  if (!isStringList(capabilities)) {
    throw new Error(`Board ${label}: "capabilities" must be a list of strings`)
  }

  const pins: Record<string, number> = {}
  const rawPins = raw.pins ?? {}
  if (!isRecord(rawPins)) {
    throw new Error(`Board ${label}: "pins" must be an object`)
  }
  for (const [pin, value] of Object.entries(rawPins)) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new Error(`Board ${label}: pin "${pin}" must be a non-negative integer`)
    }
    pins[pin] = value
  }

  const includeDirectives: Record<string, string> = {}
  const rawIncludes = raw.includeDirectives ?? {}
  if (!isRecord(rawIncludes)) {
    throw new Error(`Board ${label}: "includeDirectives" must be an object`)
  }
  for (const [capability, directive] of Object.entries(rawIncludes)) {
    if (typeof directive !== 'string') {
      throw new Error(`Board ${label}: include for "${capability}" must be a string`)
    }
    if (!capabilities.includes(capability)) {
      throw new Error(`Board ${label}: include for "${capability}" has no matching capability`)
    }
    includeDirectives[capability] = directive
  }

  return Object.freeze({
    slug,
    name,
    fqbn,
    coreId,
    corePackageUrl,
    baudRate,
    capabilities: new Set(capabilities),
    pins: Object.freeze(pins),
    pinNotes: Object.freeze(requireNonEmptyList(raw, 'pinNotes', label)),
    pitfalls: Object.freeze(requireNonEmptyList(raw, 'pitfalls', label)),
    includeDirectives: Object.freeze(includeDirectives),
  })
}

/**
 * Validate raw board records and build frozen definitions.
 * Throws on the first record that breaks an invariant (missing fields,
 * short FQBN, empty pitfalls/pin notes, duplicate slug or FQBN).
 */
export function defineBoards(records: unknown): readonly BoardDefinition[] {
  if (!Array.isArray(records)) {
    throw new Error('Board data must be a list of board records')
  }

  const boards: BoardDefinition[] = []
  const slugs = new Set<string>()
  const fqbns = new Set<string>()

  records.forEach((raw, index) => {
    const board = parseBoard(raw, index)
    if (slugs.has(board.slug)) {
      throw new Error(`Duplicate board slug "${board.slug}"`)
    }
    if (fqbns.has(board.fqbn)) {
      throw new Error(`Duplicate board fqbn "${board.fqbn}" (board "${board.slug}")`)
    }
    slugs.add(board.slug)
    fqbns.add(board.fqbn)
    boards.push(board)
  })

  return Object.freeze(boards)
}

const BOARDS = defineBoards(boardData)
const BY_SLUG = new Map(BOARDS.map(board => [board.slug, board]))

export function findBoard(slug: string): BoardDefinition | undefined {
  return BY_SLUG.get(slug)
}

/**
 * Get a board by its slug. Throws NotFoundError for unknown slugs.
 */
export function getBoard(slug: string): BoardDefinition {
  const board = findBoard(slug)
  if (!board) {
    const hint = 'Use the "boards" command to list supported boards.'
    throw new NotFoundError(`Unknown board: ${slug}. ${hint}`, hint)
  }
  return board
}

/**
 * All supported boards, in registration order.
 */
export function listBoards(): BoardDefinition[] {
  return [...BOARDS]
}

/**
 * Exact FQBN lookup. Returns undefined when no board uses the FQBN;
 * detection treats that as routine, so it is not an error.
 */
export function getBoardByFqbn(fqbn: string): BoardDefinition | undefined {
  return BOARDS.find(board => board.fqbn === fqbn)
}
