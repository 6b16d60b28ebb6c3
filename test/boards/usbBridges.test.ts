import {describe, it} from 'node:test'
import assert from 'node:assert/strict'
import {USB_BRIDGES, lookupBridge, normalizeUsbId} from '../../src/boards/usbBridges.ts'
import {findBoard} from '../../src/boards/registry.ts'

describe('usb bridges', () => {
  describe('normalizeUsbId', () => {
    it('accepts prefixed and bare hex in any case', () => {
      assert.equal(normalizeUsbId('0x1A86'), '1a86')
      assert.equal(normalizeUsbId('0X1a86'), '1a86')
      assert.equal(normalizeUsbId('1A86'), '1a86')
      assert.equal(normalizeUsbId(' 1a86 '), '1a86')
    })

    it('pads short IDs to four digits', () => {
      assert.equal(normalizeUsbId('0xA'), '000a')
    })

    it('rejects values that are not hex IDs', () => {
      assert.equal(normalizeUsbId(''), undefined)
      assert.equal(normalizeUsbId('0x'), undefined)
      assert.equal(normalizeUsbId('zzzz'), undefined)
      assert.equal(normalizeUsbId('0x12345'), undefined)
    })
  })

  describe('lookupBridge', () => {
    it('maps the CH340 to its candidate boards in table order', () => {
      assert.deepEqual(lookupBridge('0x1A86', '0x7523')?.slugs, ['esp32', 'esp8266', 'arduino-nano'])
    })

    it('gives the same answer for lowercase and bare IDs', () => {
      assert.equal(lookupBridge('1a86', '7523'), lookupBridge('0x1A86', '0x7523'))
    })

    it('returns undefined for unknown pairs', () => {
      assert.equal(lookupBridge('0xFFFF', '0xFFFF'), undefined)
      assert.equal(lookupBridge('0x1A86', '0xFFFF'), undefined)
      assert.equal(lookupBridge('not-hex', '0x7523'), undefined)
    })
  })

  it('only references registered boards', () => {
    for (const bridge of USB_BRIDGES) {
      for (const slug of bridge.slugs) {
        assert.ok(findBoard(slug), `${bridge.chip} references unknown board ${slug}`)
      }
    }
  })

  it('has one entry per vid/pid pair', () => {
    const keys = USB_BRIDGES.map(b => `${b.vid}:${b.pid}`)
    assert.equal(new Set(keys).size, keys.length)
  })
})
