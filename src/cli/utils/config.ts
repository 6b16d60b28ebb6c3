import {DEFAULT_ARDUINO_CLI, DEFAULT_DETECT_TIMEOUT_MS} from '../../boards/detection.ts'

export interface ToolConfig {
  /** arduino-cli executable used for detection and doctor checks */
  arduinoCli: string
  detectTimeoutMs: number
}

export const ENV_ARDUINO_CLI = 'BOARDCRAFT_ARDUINO_CLI'
export const ENV_DETECT_TIMEOUT_MS = 'BOARDCRAFT_DETECT_TIMEOUT_MS'

function parseTimeout(value: string): number {
  const trimmed = value.trim()
  const ms = Number(trimmed)
  if (trimmed === '' || !Number.isInteger(ms) || ms <= 0) {
    throw new Error(
      `Invalid ${ENV_DETECT_TIMEOUT_MS} value: "${value}". Expected a positive integer of milliseconds.`,
    )
  }
  return ms
}

/**
 * The arduino-cli executable: --arduino-cli, then the environment, then PATH.
 */
export function resolveArduinoCli(option?: string, env: NodeJS.ProcessEnv = process.env): string {
  return option || env[ENV_ARDUINO_CLI]?.trim() || DEFAULT_ARDUINO_CLI
}

/**
 * Resolve tool settings. Precedence: command-line option, environment, default.
 */
export function resolveToolConfig(
  overrides: {arduinoCli?: string} = {},
  env: NodeJS.ProcessEnv = process.env,
): ToolConfig {
  const envTimeout = env[ENV_DETECT_TIMEOUT_MS]

  return {
    arduinoCli: resolveArduinoCli(overrides.arduinoCli, env),
    detectTimeoutMs: envTimeout !== undefined ? parseTimeout(envTimeout) : DEFAULT_DETECT_TIMEOUT_MS,
  }
}
