import {readdir} from 'node:fs/promises'
import type {CliCommand} from '../utils/types.ts'
import {createPrefixLog} from '../utils/prefixLog.ts'
import {resolveArduinoCli} from '../utils/config.ts'
import {green, yellow} from '../utils/colors.ts'
import {runTool, succeeded, type ToolRunner} from '../../utils/runTool.ts'

const CHECK_TIMEOUT_MS = 5_000
const SERIAL_DEVICE = /^(ttyUSB|ttyACM|cu\.usb)/

export interface DoctorDeps {
  run?: ToolRunner
  listSerialPorts?: () => Promise<string[]>
  env?: NodeJS.ProcessEnv
}

interface CheckResult {
  ok: boolean
  lines: string[]
}

async function listDevSerialPorts(): Promise<string[]> {
  try {
    const entries = await readdir('/dev')
    return entries.filter(name => SERIAL_DEVICE.test(name)).map(name => `/dev/${name}`)
  } catch {
    // no /dev (Windows)
    return []
  }
}

function checkArduinoCli(run: ToolRunner, cli: string): CheckResult {
  const result = run(cli, ['version'], {timeoutMs: CHECK_TIMEOUT_MS})
  if (succeeded(result)) {
    const version = result.stdout.trim()
    return {ok: true, lines: [`[OK] arduino-cli found: ${cli}`, ...(version ? [`     ${version}`] : [])]}
  }
  return {
    ok: false,
    lines: ['[!!] arduino-cli not found. Install: https://arduino.github.io/arduino-cli/installation/'],
  }
}

function checkSerialPorts(ports: string[]): CheckResult {
  if (ports.length === 0) {
    return {ok: false, lines: ['[!!] No serial ports detected. Is a board connected via USB?']}
  }
  return {ok: true, lines: ['[OK] Serial ports found:', ...ports.map(port => `     ${port}`)]}
}

function checkPyserial(run: ToolRunner): CheckResult {
  const result = run('python3', ['-c', 'import serial; print(serial.__version__)'], {timeoutMs: CHECK_TIMEOUT_MS})
  if (succeeded(result)) {
    return {ok: true, lines: [`[OK] pyserial installed: ${result.stdout.trim()}`]}
  }
  return {ok: false, lines: ['[!!] pyserial not installed. Run: pip install pyserial']}
}

/**
 * Check the local toolchain: arduino-cli, serial devices and pyserial.
 * Reports problems but never fails the command.
 */
export const doctor: CliCommand<[DoctorDeps?]> = async (ctx, deps = {}) => {
  const {run = runTool, listSerialPorts = listDevSerialPorts, env = process.env} = deps
  const cmdLog = createPrefixLog(ctx.cliName, 'doctor')
  // doctor never reads the detection timeout
  const arduinoCli = resolveArduinoCli(ctx.arduinoCli, env)

  cmdLog.verbose(`checking ${arduinoCli}`)
  const checks = [checkArduinoCli(run, arduinoCli), checkSerialPorts(await listSerialPorts()), checkPyserial(run)]

  for (const check of checks) {
    for (const line of check.lines) {
      ctx.stdout.write(line + '\n')
    }
  }

  if (checks.every(check => check.ok)) {
    ctx.stdout.write(`\n${green('All checks passed.')} Ready for embedded development.\n`)
  } else {
    ctx.stdout.write(`\n${yellow('Some checks failed.')} Fix the issues above before running "${ctx.cliName} init".\n`)
  }
}
