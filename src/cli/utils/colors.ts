/**
 * ANSI color helpers for CLI output.
 * Disabled when stdout is not a TTY or NO_COLOR is set.
 */

const supportsColor = process.stdout.isTTY && !process.env.NO_COLOR

const code = (n: number) => (supportsColor ? `\x1b[${n}m` : '')

const reset = code(0)

export const bold = (s: string) => `${code(1)}${s}${reset}`
export const dim = (s: string) => `${code(2)}${s}${reset}`

export const red = (s: string) => `${code(31)}${s}${reset}`
export const green = (s: string) => `${code(32)}${s}${reset}`
export const yellow = (s: string) => `${code(33)}${s}${reset}`
export const blue = (s: string) => `${code(34)}${s}${reset}`
export const magenta = (s: string) => `${code(35)}${s}${reset}`
export const cyan = (s: string) => `${code(36)}${s}${reset}`
