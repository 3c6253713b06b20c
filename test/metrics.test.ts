import { describe, it, expect } from 'vitest'
import {
  decodeCompressedMetrics,
  decodeStandardMetrics,
  glyphHeight,
  glyphWidth,
} from '../src/pcf/metrics'
import { bytesPerRow, paddingFromFormat } from '../src/pcf/rows'

describe('bytesPerRow', () => {
  it('rounds widths up to the padding unit', () => {
    expect(bytesPerRow(9, 1)).toBe(2)
    expect(bytesPerRow(8, 1)).toBe(1)
    expect(bytesPerRow(8, 4)).toBe(4)
    expect(bytesPerRow(9, 2)).toBe(2)
    expect(bytesPerRow(17, 2)).toBe(4)
    expect(bytesPerRow(33, 4)).toBe(8)
  })

  it('is zero for empty rows', () => {
    expect(bytesPerRow(0, 1)).toBe(0)
    expect(bytesPerRow(0, 2)).toBe(0)
    expect(bytesPerRow(0, 4)).toBe(0)
  })
})

describe('paddingFromFormat', () => {
  it('maps the two padding bits', () => {
    expect(paddingFromFormat(0)).toBe('byte')
    expect(paddingFromFormat(1)).toBe('short')
    expect(paddingFromFormat(2)).toBe('int')
  })

  it('rejects the reserved value', () => {
    expect(paddingFromFormat(3)).toBeNull()
  })
})

describe('metrics decoding', () => {
  it('removes the bias from compressed metrics', () => {
    expect(decodeCompressedMetrics(Uint8Array.of(0x81, 0x82, 0x83, 0x84, 0x85))).toEqual({
      leftSideBearing: 1,
      rightSideBearing: 2,
      characterWidth: 3,
      characterAscent: 4,
      characterDescent: 5,
      characterAttributes: 0,
    })
  })

  it('decodes negative compressed values', () => {
    const metrics = decodeCompressedMetrics(Uint8Array.of(0x7e, 0x80, 0x80, 0x80, 0x7f))
    expect(metrics.leftSideBearing).toBe(-2)
    expect(metrics.characterDescent).toBe(-1)
  })

  it('decodes standard metrics as big-endian fields', () => {
    const data = Uint8Array.of(
      0xff, 0xff, // lsb -1
      0x00, 0x07, // rsb 7
      0x00, 0x08, // width 8
      0x00, 0x0a, // ascent 10
      0x00, 0x03, // descent 3
      0x12, 0x34 // attributes
    )
    const metrics = decodeStandardMetrics(data)
    expect(metrics).toEqual({
      leftSideBearing: -1,
      rightSideBearing: 7,
      characterWidth: 8,
      characterAscent: 10,
      characterDescent: 3,
      characterAttributes: 0x1234,
    })
    expect(glyphWidth(metrics)).toBe(8)
    expect(glyphHeight(metrics)).toBe(13)
  })

  it('decodes at an offset', () => {
    const data = new Uint8Array(17)
    data.set([0x81, 0x82, 0x83, 0x84, 0x85], 12)
    expect(decodeCompressedMetrics(data, 12).characterWidth).toBe(3)
  })
})
