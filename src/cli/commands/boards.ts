import {listBoards} from '../../boards/registry.ts'
import type {CliCommand} from '../utils/types.ts'
import {formatTable, logData} from '../utils/logData.ts'

const COLUMNS = [
  {key: 'slug', label: 'Slug'},
  {key: 'name', label: 'Name'},
  {key: 'fqbn', label: 'FQBN'},
]

/**
 * List supported boards
 */
export const boards: CliCommand = async ctx => {
  const rows = listBoards().map(({slug, name, fqbn}) => ({slug, name, fqbn}))

  if (ctx.json) {
    logData(rows, ctx.stdout)
    return
  }

  ctx.stdout.write(`Supported boards (${rows.length}):\n\n`)
  for (const line of formatTable(rows, COLUMNS)) {
    ctx.stdout.write(line + '\n')
  }
}
