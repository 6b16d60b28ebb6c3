import {describe, it} from 'node:test'
import assert from 'node:assert/strict'
import {defineBoards, findBoard, getBoard, getBoardByFqbn, listBoards} from '../../src/boards/registry.ts'
import {NotFoundError} from '../../src/utils/NotFoundError.ts'

const ALL_BOARD_SLUGS = [
  'esp32',
  'esp32s3',
  'esp32c3',
  'esp32c6',
  'esp8266',
  'arduino-uno',
  'arduino-nano',
  'arduino-mega',
  'rp2040',
  'teensy40',
  'teensy41',
  'stm32-nucleo',
]

function validRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    slug: 'test-board',
    name: 'Test Board',
    fqbn: 'vendor:arch:model',
    coreId: 'vendor:arch',
    corePackageUrl: '',
    baudRate: 9600,
    capabilities: ['wifi'],
    pins: {onboard_led: 13},
    pinNotes: ['GPIO 13: LED'],
    pitfalls: ['Watch out'],
    includeDirectives: {wifi: '#include <WiFi.h>'},
    ...overrides,
  }
}

describe('board registry', () => {
  describe('getBoard', () => {
    it('returns the ESP32 definition', () => {
      const board = getBoard('esp32')
      assert.equal(board.name, 'ESP32')
      assert.equal(board.fqbn, 'esp32:esp32:esp32')
      assert.equal(board.coreId, 'esp32:esp32')
      assert.equal(board.baudRate, 115200)
      assert.equal(board.pins.onboard_led, 2)
      assert.ok(board.capabilities.has('wifi'))
      assert.ok(board.capabilities.has('bluetooth'))
      assert.ok(board.pitfalls.some(p => p.includes('ADC2')))
      assert.equal(board.includeDirectives.wifi, '#include <WiFi.h>')
    })

    it('keeps pin notes and pitfalls word for word', () => {
      assert.equal(getBoard('esp32').pinNotes[0], 'GPIO 0: Boot button — do not use for general I/O')
      assert.equal(
        getBoard('arduino-uno').pitfalls[1],
        'No floating-point hardware — float operations are slow and use flash.',
      )
    })

    it('leaves corePackageUrl empty for cores bundled with arduino-cli', () => {
      assert.equal(getBoard('arduino-uno').corePackageUrl, '')
    })

    it('throws NotFoundError with a hint for unknown slugs', () => {
      assert.throws(
        () => getBoard('nonexistent'),
        (error: unknown) => {
          assert.ok(error instanceof NotFoundError)
          assert.equal(error.message, 'Unknown board: nonexistent. Use the "boards" command to list supported boards.')
          assert.equal(error.hint, 'Use the "boards" command to list supported boards.')
          return true
        },
      )
    })

    it('is case sensitive', () => {
      assert.throws(() => getBoard('ESP32'), NotFoundError)
    })
  })

  describe('findBoard', () => {
    it('returns undefined instead of throwing', () => {
      assert.equal(findBoard('nonexistent'), undefined)
      assert.equal(findBoard('rp2040')?.name, 'Raspberry Pi Pico (RP2040)')
    })
  })

  describe('listBoards', () => {
    it('lists every board in registration order', () => {
      assert.deepEqual(
        listBoards().map(b => b.slug),
        ALL_BOARD_SLUGS,
      )
    })

    it('returns a fresh array on each call', () => {
      const first = listBoards()
      first.pop()
      assert.equal(listBoards().length, 12)
      assert.notEqual(listBoards(), listBoards())
    })

    it('returns frozen definitions', () => {
      const board = listBoards()[0]
      assert.ok(Object.isFrozen(board))
      assert.ok(Object.isFrozen(board.pins))
      assert.ok(Object.isFrozen(board.pitfalls))
    })
  })

  describe('invariants', () => {
    for (const slug of ALL_BOARD_SLUGS) {
      it(`${slug} has the required fields`, () => {
        const board = getBoard(slug)
        assert.ok(board.name)
        assert.ok(board.coreId)
        assert.ok(board.baudRate > 0)
        assert.ok(board.pitfalls.length > 0)
        assert.ok(board.pinNotes.length > 0)
        assert.ok(board.fqbn.split(':').length >= 3)
      })
    }

    it('slugs and FQBNs are unique', () => {
      const boards = listBoards()
      assert.equal(new Set(boards.map(b => b.slug)).size, boards.length)
      assert.equal(new Set(boards.map(b => b.fqbn)).size, boards.length)
    })

    it('wifi boards have the wifi capability', () => {
      for (const slug of ['esp32', 'esp32s3', 'esp32c3', 'esp32c6', 'esp8266']) {
        assert.ok(getBoard(slug).capabilities.has('wifi'), slug)
      }
    })

    it('basic boards have no wifi', () => {
      for (const slug of ['arduino-uno', 'arduino-nano', 'arduino-mega', 'rp2040']) {
        assert.equal(getBoard(slug).capabilities.has('wifi'), false, slug)
      }
    })
  })

  describe('getBoardByFqbn', () => {
    it('finds boards by FQBN', () => {
      assert.equal(getBoardByFqbn('esp32:esp32:esp32')?.slug, 'esp32')
      assert.equal(getBoardByFqbn('arduino:avr:uno')?.slug, 'arduino-uno')
    })

    it('returns undefined for unknown FQBNs', () => {
      assert.equal(getBoardByFqbn('unknown:unknown:unknown'), undefined)
      assert.equal(getBoardByFqbn(''), undefined)
    })

    it('requires an exact match', () => {
      assert.equal(getBoardByFqbn('esp32:esp32:esp32:UploadSpeed=115200'), undefined)
      assert.equal(getBoardByFqbn('ESP32:ESP32:ESP32'), undefined)
    })

    it('round-trips every board through its FQBN', () => {
      for (const board of listBoards()) {
        assert.equal(getBoardByFqbn(board.fqbn)?.slug, board.slug)
      }
    })
  })

  describe('defineBoards', () => {
    it('builds a definition from a valid record', () => {
      const [board] = defineBoards([validRecord()])
      assert.equal(board.slug, 'test-board')
      assert.deepEqual([...board.capabilities], ['wifi'])
      assert.deepEqual(board.pins, {onboard_led: 13})
    })

    it('rejects data that is not a list', () => {
      assert.throws(() => defineBoards({}), /Board data must be a list/)
    })

    it('rejects duplicate slugs', () => {
      assert.throws(
        () => defineBoards([validRecord(), validRecord({fqbn: 'vendor:arch:other'})]),
        /Duplicate board slug "test-board"/,
      )
    })

    it('rejects duplicate FQBNs', () => {
      assert.throws(
        () => defineBoards([validRecord(), validRecord({slug: 'other'})]),
        /Duplicate board fqbn "vendor:arch:model" \(board "other"\)/,
      )
    })

    it('rejects FQBNs with fewer than three parts', () => {
      assert.throws(() => defineBoards([validRecord({fqbn: 'vendor:arch'})]), /at least 3 colon-separated parts/)
    })

    it('rejects boards without pitfalls or pin notes', () => {
      assert.throws(() => defineBoards([validRecord({pitfalls: []})]), /"pitfalls" must be a non-empty list/)
      assert.throws(() => defineBoards([validRecord({pinNotes: []})]), /"pinNotes" must be a non-empty list/)
    })

    it('rejects a non-positive baud rate', () => {
      assert.throws(() => defineBoards([validRecord({baudRate: 0})]), /"baudRate" must be a positive integer/)
    })

    it('rejects include directives for capabilities the board does not have', () => {
      assert.throws(
        () => defineBoards([validRecord({includeDirectives: {ota: '#include <ArduinoOTA.h>'}})]),
        /include for "ota" has no matching capability/,
      )
    })
  })
})
