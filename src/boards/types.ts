/**
 * Static metadata for one supported board.
 */
export interface BoardDefinition {
  /** Short stable key used on the command line (e.g. 'esp32') */
  readonly slug: string
  /** Human-readable label */
  readonly name: string
  /** Fully qualified board name understood by arduino-cli (e.g. 'esp32:esp32:esp32') */
  readonly fqbn: string
  /** Board support package the FQBN belongs to (e.g. 'esp32:esp32') */
  readonly coreId: string
  /** Additional boards manager URL for the core, empty when bundled with arduino-cli */
  readonly corePackageUrl: string
  readonly baudRate: number
  readonly capabilities: ReadonlySet<string>
  readonly pins: Readonly<Record<string, number>>
  readonly pinNotes: readonly string[]
  readonly pitfalls: readonly string[]
  /** Capability tag -> `#include` line needed to use it */
  readonly includeDirectives: Readonly<Record<string, string>>
}

/**
 * A registry board found attached to a serial port.
 */
export interface DetectedBoard {
  board: BoardDefinition
  port: string
}
