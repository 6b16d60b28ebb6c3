import {bold} from './colors.ts'

type Row = Record<string, string | number | boolean>

/**
 * Write command results as pretty-printed JSON (--json).
 */
export function logData(data: Row | Row[], out: NodeJS.WritableStream = process.stdout): void {
  out.write(JSON.stringify(data, null, 2) + '\n')
}

/**
 * Render rows as a fixed-width table with a bold header and a rule line.
 * Every column is padded to its widest cell; the last column is not padded.
 */
export function formatTable(rows: Row[], columns: Array<{key: string; label: string}>, indent = '  '): string[] {
  const widths = columns.map(({key, label}) =>
    Math.max(label.length, ...rows.map(row => String(row[key] ?? '').length)),
  )
  const line = (cells: string[]) =>
    indent +
    cells
      .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i])))
      .join('  ')
      .trimEnd()

  return [
    bold(line(columns.map(c => c.label))),
    line(widths.map(w => '-'.repeat(w))),
    ...rows.map(row => line(columns.map(c => String(row[c.key] ?? '')))),
  ]
}
