import type {PrefixLog} from './prefixLog.ts'
import {writeFile as nodeWriteFile, access as nodeAccess} from 'node:fs/promises'
import {relative, resolve} from 'node:path'
import {homedir} from 'node:os'

function formatPath(inputPath: string, cwd: string): string {
  const absPath = resolve(cwd, inputPath)
  const rel = relative(cwd, absPath)
  if (!rel.startsWith('..')) {
    return rel === '' ? '.' : './' + rel
  }
  const home = homedir()
  if (absPath === home || absPath.startsWith(home + '/')) {
    return '~' + absPath.slice(home.length)
  }
  return absPath
}

/**
 * fs wrapper that reports every touched path at `fs` level, relative to cwd.
 */
export function createLoggedFs(log: PrefixLog, cwd: string = process.cwd()) {
  return {
    async writeFile(path: string, content: string) {
      await nodeWriteFile(resolve(cwd, path), content, 'utf-8')
      log.fs(`writing ${formatPath(path, cwd)}`)
    },
    async exists(path: string): Promise<boolean> {
      try {
        await nodeAccess(resolve(cwd, path))
        return true
      } catch {
        return false
      }
    },
  }
}
