import type {CliCommand} from '../utils/types.ts'
import {createPrefixLog} from '../utils/prefixLog.ts'
import {formatTable, logData} from '../utils/logData.ts'
import {detectAttached, type Detector} from '../utils/detectAttached.ts'

/**
 * List attached boards that match a supported board.
 * A port on a generic USB-serial chip may be listed once per candidate board.
 */
export const detect: CliCommand<[{detect?: Detector}?]> = async (ctx, deps = {}) => {
  const cmdLog = createPrefixLog(ctx.cliName, 'detect')
  const detected = (deps.detect ?? detectAttached)(ctx, cmdLog)

  const rows = detected.map(({board, port}) => ({port, slug: board.slug, name: board.name, fqbn: board.fqbn}))
  if (ctx.json) {
    logData(rows, ctx.stdout)
    return
  }

  if (rows.length === 0) {
    ctx.stdout.write(`No boards detected. Check the USB cable, then run "${ctx.cliName} doctor".\n`)
    return
  }

  const columns = [
    {key: 'port', label: 'Port'},
    {key: 'slug', label: 'Slug'},
    {key: 'name', label: 'Name'},
  ]
  for (const line of formatTable(rows, columns)) {
    ctx.stdout.write(line + '\n')
  }
  ctx.stdout.write(`\nRun "${ctx.cliName} init --board <slug> --port <port>" to generate instructions.\n`)
}
