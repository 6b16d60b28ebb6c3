import {Command, CommanderError} from 'commander'
import {getCliName, getCliVersion} from './cliName.ts'
import type {CliContext} from './types.ts'
import {red, cyan} from './colors.ts'
import {init} from '../commands/init.ts'
import {boards} from '../commands/boards.ts'
import {detect} from '../commands/detect.ts'
import {doctor} from '../commands/doctor.ts'

type RunCliOptions = {
  stdout?: NodeJS.WritableStream
  stderr?: NodeJS.WritableStream
}

const LEVEL_OPTIONS = {
  silent: {index: 0},
  error: {index: 1},
  warn: {index: 2},
  notice: {index: 3},
  http: {index: 4},
  info: {index: 5},
  verbose: {index: 6},
  silly: {index: 7},
}

type LevelName = keyof typeof LEVEL_OPTIONS

function isLevelName(level: string): level is LevelName {
  return Object.hasOwn(LEVEL_OPTIONS, level)
}

type LogListener = (level: string, ...args: unknown[]) => void

/**
 * Build the proc-log listener that prints everything up to maxLevel.
 */
function createLogListener(maxLevel: LevelName, out: NodeJS.WritableStream, stderr: NodeJS.WritableStream): LogListener {
  const cliName = getCliName()
  const maxIndex = LEVEL_OPTIONS[maxLevel].index

  return (level, ...args) => {
    if (!isLevelName(level) || LEVEL_OPTIONS[level].index > maxIndex) return

    const message = args.map(arg => (typeof arg === 'string' ? arg : JSON.stringify(arg))).join(' ')
    if (level === 'error') {
      for (const line of message.split('\n')) {
        stderr.write(`${cyan(cliName)} ${red('error')} ${line}\n`)
      }
    } else if (level === 'warn') {
      stderr.write(message + '\n')
    } else {
      out.write(message + '\n')
    }
  }
}

function createProgram(stdout: NodeJS.WritableStream, stderr: NodeJS.WritableStream, listeners: LogListener[]): Command {
  const program = new Command()

  program
    .name(getCliName())
    .description('Generate AI assistant instructions for a microcontroller board.')
    .version(getCliVersion())
    .option('-s, --silent', 'Suppress log output')
    .option('--json', 'Output as JSON (for commands that support it)')
    .option('--log-level <level>', 'Set log level (error, warn, notice, http, info, verbose, silly)', 'info')
    .option('--arduino-cli <path>', 'arduino-cli executable (defaults to BOARDCRAFT_ARDUINO_CLI or arduino-cli)')

  // Attach the proc-log listener before any command runs, using Commander-parsed options
  program.hook('preAction', () => {
    const opts = program.opts<{silent?: boolean; json?: boolean; logLevel?: string}>()
    const logLevel = opts.silent ? 'silent' : (opts.logLevel ?? 'info')
    if (!isLevelName(logLevel)) {
      throw new Error(`Invalid --log-level value: "${logLevel}".`)
    }
    if (LEVEL_OPTIONS[logLevel].index <= 0) return

    // stdout is reserved for the JSON document under --json
    const listener = createLogListener(logLevel, opts.json ? stderr : stdout, stderr)
    listeners.push(listener)
    process.on('log', listener)
  })

  const getCtx = (): CliContext => {
    const opts = program.opts<{json?: boolean; arduinoCli?: string}>()
    return {
      cliName: getCliName(),
      cwd: process.cwd(),
      stdout,
      json: opts.json,
      arduinoCli: opts.arduinoCli,
    }
  }

  program
    .command('init')
    .description('Generate CLAUDE.md and .cursorrules for your board')
    .option('-b, --board <slug>', `Board slug (e.g. esp32, arduino-uno). Use "${getCliName()} boards" to list.`)
    .option('-p, --port <path>', 'Serial port (e.g. /dev/ttyUSB0, /dev/cu.usbserial-0001)')
    .option('-y, --yes', 'Overwrite existing files without asking')
    .action(async (options: {board?: string; port?: string; yes?: boolean}) => {
      await init(getCtx(), options)
    })

  program
    .command('boards')
    .description('List supported boards')
    .action(async () => {
      await boards(getCtx())
    })

  program
    .command('detect')
    .description('Detect attached boards using arduino-cli')
    .action(async () => {
      await detect(getCtx())
    })

  program
    .command('doctor')
    .description('Check your environment for embedded development')
    .action(async () => {
      await doctor(getCtx())
    })

  return program
}

export async function program(args: string[], options: RunCliOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout
  const stderr = options.stderr ?? process.stderr
  const listeners: LogListener[] = []

  const program = createProgram(stdout, stderr, listeners)

  program.configureOutput({
    writeOut: str => {
      stdout.write(str)
    },
    writeErr: str => {
      stderr.write(str)
    },
  })

  program.exitOverride()

  try {
    await program.parseAsync(args, {from: 'user'})
    return 0
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }

    const err = error instanceof Error ? error : new Error(String(error))
    const opts = program.opts<{json?: boolean; logLevel?: string}>()

    if (opts.json) {
      stdout.write(JSON.stringify({error: err.message}) + '\n')
    } else {
      const isVerbose = opts.logLevel === 'verbose' || opts.logLevel === 'silly'
      const text = isVerbose && err.stack ? err.stack : err.message
      const cliName = getCliName()
      for (const line of text.split('\n')) {
        stderr.write(`${cyan(cliName)} ${red('error')} ${line}\n`)
      }
    }

    return 1
  } finally {
    for (const listener of listeners) {
      process.removeListener('log', listener)
    }
  }
}
