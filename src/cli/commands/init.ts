import {confirm, select} from '@inquirer/prompts'
import {getBoard} from '../../boards/registry.ts'
import type {DetectedBoard} from '../../boards/types.ts'
import type {CliCommand} from '../utils/types.ts'
import {createPrefixLog} from '../utils/prefixLog.ts'
import {createLoggedFs} from '../utils/createLoggedFs.ts'
import {detectAttached, describeDetected, type Detector} from '../utils/detectAttached.ts'
import {INSTRUCTION_FILES, renderInstructions} from '../utils/instructions.ts'

interface InitOptions {
  board?: string
  port?: string
  /** Overwrite existing files without asking */
  yes?: boolean
}

export interface InitPrompts {
  confirm: (message: string) => Promise<boolean>
  choose: (message: string, detected: DetectedBoard[]) => Promise<DetectedBoard>
}

const defaultPrompts: InitPrompts = {
  confirm: message => confirm({message, default: false}),
  choose: (message, detected) =>
    select({
      message,
      choices: detected.map(d => ({name: describeDetected(d), value: d})),
    }),
}

/**
 * Generate CLAUDE.md (and .cursorrules) for a board and serial port.
 * Missing --board or --port are filled in from the attached boards.
 */
export const init: CliCommand<[InitOptions?, {detect?: Detector; prompts?: InitPrompts}?]> = async (
  ctx,
  options = {},
  deps = {},
) => {
  const {detect = detectAttached, prompts = defaultPrompts} = deps
  const cmdLog = createPrefixLog(ctx.cliName, 'init')
  const fs = createLoggedFs(cmdLog, ctx.cwd)

  // Unknown slugs fail here, before anything is probed or written
  const requested = options.board ? getBoard(options.board) : undefined

  let target: DetectedBoard
  if (requested && options.port) {
    target = {board: requested, port: options.port}
  } else {
    const detected = detect(ctx, cmdLog).filter(
      d => (!requested || d.board.slug === requested.slug) && (!options.port || d.port === options.port),
    )

    if (detected.length === 0) {
      throw new Error(
        `No board detected. Pass --board and --port explicitly, or connect a board and run "${ctx.cliName} detect".`,
      )
    }

    if (detected.length === 1) {
      target = detected[0]
      cmdLog.info(`Detected ${describeDetected(target)}`)
    } else {
      target = await prompts.choose('Multiple boards detected. Which one are you using?', detected)
    }
  }

  const {board, port} = target
  const content = renderInstructions(board, port)

  const [primary] = INSTRUCTION_FILES
  if (!options.yes && (await fs.exists(primary))) {
    const overwrite = await prompts.confirm(`${primary} already exists. Overwrite?`)
    if (!overwrite) {
      cmdLog.info('Aborted.')
      return
    }
  }

  for (const file of INSTRUCTION_FILES) {
    await fs.writeFile(file, content)
  }

  cmdLog.info(`Generated ${primary} for ${board.name} on ${port}`)
  cmdLog.info('Also created .cursorrules for Cursor users.')
}
