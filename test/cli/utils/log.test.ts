import {describe, it, beforeEach, afterEach} from 'node:test'
import assert from 'node:assert/strict'
import log from '../../../src/cli/utils/log.ts'

describe('log', () => {
  let capturedLogs: Array<{level: string; args: unknown[]}>
  const logHandler = (level: string, ...args: unknown[]) => {
    capturedLogs.push({level, args})
  }

  beforeEach(() => {
    capturedLogs = []
    process.on('log', logHandler)
  })

  afterEach(() => {
    process.removeListener('log', logHandler)
  })

  for (const level of ['info', 'warn', 'error', 'verbose', 'silly'] as const) {
    it(`${level} emits a log event at ${level} level`, () => {
      log[level]('board attached')
      assert.deepEqual(capturedLogs, [{level, args: ['board attached']}])
    })
  }

  it('passes every argument through', () => {
    log.info('ports:', 2, 'found')
    assert.deepEqual(capturedLogs[0].args, ['ports:', 2, 'found'])
  })

  it('emits one event per call in order', () => {
    log.info('first')
    log.warn('second')
    log.error('third')
    assert.deepEqual(
      capturedLogs.map(l => l.level),
      ['info', 'warn', 'error'],
    )
  })
})
