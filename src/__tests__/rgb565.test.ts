import { toRgb565, toRotation } from '../rgb565'
import type { Frame } from '../render'

// 2x1: red, blue
const wide: Frame = { width: 2, height: 1, rgb: Buffer.from([255, 0, 0, 0, 0, 255]) }

const words = (buf: Buffer): number[] => Array.from({ length: buf.length / 2 }, (_, i) => buf.readUInt16BE(i * 2))

describe('toRgb565', () => {
  it('packs 5-6-5 bits big-endian', () => {
    const out = toRgb565(wide, 0)
    expect([...out]).toEqual([0xf8, 0x00, 0x00, 0x1f])
  })

  it('keeps the high bits of each channel', () => {
    const grey: Frame = { width: 1, height: 1, rgb: Buffer.from([0x84, 0x82, 0x81]) }
    // r 10000 g 100000 b 10000
    expect(words(toRgb565(grey, 0))).toEqual([0x8410])
  })

  it('rotates clockwise by 90 degrees', () => {
    // 2x1 becomes 1x2: red on top, blue below
    expect(words(toRgb565(wide, 90))).toEqual([0xf800, 0x001f])
  })

  it('rotates by 180 and 270 degrees', () => {
    expect(words(toRgb565(wide, 180))).toEqual([0x001f, 0xf800])
    expect(words(toRgb565(wide, 270))).toEqual([0x001f, 0xf800])
  })
})

describe('toRotation', () => {
  it('accepts right angles only', () => {
    expect(toRotation(90)).toBe(90)
    expect(() => toRotation(45)).toThrow('Unsupported display rotation: 45')
  })
})
