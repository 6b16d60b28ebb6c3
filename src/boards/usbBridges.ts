export interface UsbBridge {
  /** USB vendor ID, lowercase hex without prefix */
  vid: string
  /** USB product ID, lowercase hex without prefix */
  pid: string
  chip: string
  /**
   * Boards commonly shipped with this chip. One generic USB-serial bridge is
   * used by several board families, so every slug here is a candidate.
   */
  slugs: readonly string[]
}

export const USB_BRIDGES: readonly UsbBridge[] = [
  {vid: '1a86', pid: '7523', chip: 'WCH CH340', slugs: ['esp32', 'esp8266', 'arduino-nano']},
  {vid: '1a86', pid: '55d4', chip: 'WCH CH9102', slugs: ['esp32']},
  {vid: '10c4', pid: 'ea60', chip: 'Silicon Labs CP210x', slugs: ['esp32', 'esp8266']},
  {vid: '0403', pid: '6001', chip: 'FTDI FT232R', slugs: ['arduino-nano']},
  {vid: '2341', pid: '0043', chip: 'Arduino Uno R3 (ATmega16U2)', slugs: ['arduino-uno']},
  {vid: '2341', pid: '0042', chip: 'Arduino Mega 2560 R3 (ATmega16U2)', slugs: ['arduino-mega']},
  {vid: '303a', pid: '1001', chip: 'Espressif USB JTAG/serial', slugs: ['esp32s3', 'esp32c3', 'esp32c6']},
  {vid: '2e8a', pid: '000a', chip: 'Raspberry Pi RP2040', slugs: ['rp2040']},
  {vid: '16c0', pid: '0483', chip: 'PJRC Teensy USB serial', slugs: ['teensy40', 'teensy41']},
  {vid: '0483', pid: '374b', chip: 'ST-LINK/V2-1', slugs: ['stm32-nucleo']},
]

/**
 * Normalize a USB vendor/product ID: '0x1A86', '1A86' and '1a86' all become '1a86'.
 * Returns undefined for anything that is not 1-4 hex digits.
 */
export function normalizeUsbId(value: string): string | undefined {
  const bare = value.trim().toLowerCase().replace(/^0x/, '')
  if (!/^[0-9a-f]{1,4}$/.test(bare)) return undefined
  return bare.padStart(4, '0')
}

export function lookupBridge(vid: string, pid: string): UsbBridge | undefined {
  const normalizedVid = normalizeUsbId(vid)
  const normalizedPid = normalizeUsbId(pid)
  if (!normalizedVid || !normalizedPid) return undefined
  return USB_BRIDGES.find(bridge => bridge.vid === normalizedVid && bridge.pid === normalizedPid)
}
