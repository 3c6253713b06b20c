import { gzipSync } from 'node:zlib'
import { describe, it, expect } from 'vitest'
import { loadPcfFont } from '../src/pcf/load'
import { loadPcfFontFromBytes } from '../src/pcf/open'
import { PCF_BIT_MASK, PCF_BYTE_MASK } from '../src/pcf/constants'
import { PcfError } from '../src/shared/errors'
import type { ByteSource } from '../src/source/byte-source'
import { MemorySource } from '../src/source/memory-source'
import { errorKind } from './helpers/errors'
import { LETTER_A, QUESTION, sampleFontBytes } from './helpers/fixtures'
import { MSB_FORMAT } from './helpers/pcf-builder'

function load(bytes: Uint8Array) {
  return loadPcfFont(new MemorySource(bytes))
}

describe('loadPcfFont', () => {
  it('loads a well-formed font', () => {
    const font = load(sampleFontBytes())

    expect(font.glyphCount).toBe(5)
    expect(font.ascent).toBe(7)
    expect(font.descent).toBe(2)
    expect(font.boundingBox).toEqual({ width: 10, height: 9, xOffset: 0, yOffset: -2 })
    expect(font.maxAscent).toBe(7)
    expect(font.rowPadding).toBe('byte')
    expect(font.metricsCompressed).toBe(false)
    expect(font.encodingRange).toEqual({
      minByte1: 0,
      maxByte1: 0,
      minCharOrByte2: 0x20,
      maxCharOrByte2: 0x67,
    })
    expect(font.defaultChar).toBe(QUESTION.codePoint)
  })

  it('derives the glyph buffer size from the bounding box', () => {
    // 10 pixels wide => 2 bytes per row, 9 rows
    expect(load(sampleFontBytes()).maxBytesPerGlyph()).toBe(18)
  })

  it('reads the padding mode of the bitmap table', () => {
    expect(load(sampleFontBytes({ padding: 'short' })).rowPadding).toBe('short')
    expect(load(sampleFontBytes({ padding: 'int' })).rowPadding).toBe('int')
  })

  it('reads compressed metrics tables', () => {
    const font = load(sampleFontBytes({ compressedMetrics: true }))
    expect(font.metricsCompressed).toBe(true)
    expect(font.glyphCount).toBe(5)
  })

  it('keeps font ascent and descent apart from the glyph bounds', () => {
    const font = load(sampleFontBytes({ ascent: 8, descent: 3 }))
    expect(font.ascent).toBe(8)
    expect(font.descent).toBe(3)
    expect(font.boundingBox).toEqual({ width: 10, height: 9, xOffset: 0, yOffset: -2 })
  })

  it('falls back to the plain accelerators table', () => {
    const font = load(sampleFontBytes({ acceleratorsKind: 'plain' }))
    expect(font.boundingBox).toEqual({ width: 10, height: 9, xOffset: 0, yOffset: -2 })
  })

  it('accepts both accelerator tables', () => {
    expect(load(sampleFontBytes({ acceleratorsKind: 'both' })).ascent).toBe(7)
  })

  it('takes the bounding box from ink bounds when present', () => {
    const font = load(
      sampleFontBytes({
        inkBounds: {
          min: {
            leftSideBearing: 1,
            rightSideBearing: 1,
            characterWidth: 4,
            characterAscent: 0,
            characterDescent: 0,
          },
          max: {
            leftSideBearing: 1,
            rightSideBearing: 9,
            characterWidth: 11,
            characterAscent: 6,
            characterDescent: 1,
          },
        },
      })
    )
    expect(font.boundingBox).toEqual({ width: 8, height: 7, xOffset: 1, yOffset: -1 })
  })

  it('applies the default character option', () => {
    const font = loadPcfFont(new MemorySource(sampleFontBytes()), {
      defaultChar: LETTER_A.codePoint,
    })
    expect(font.defaultChar).toBe(LETTER_A.codePoint)
  })

  it('summarises the font', () => {
    expect(load(sampleFontBytes({ compressedMetrics: true })).describe()).toEqual({
      glyphCount: 5,
      ascent: 7,
      descent: 2,
      boundingBox: { width: 10, height: 9, xOffset: 0, yOffset: -2 },
      metricsCompressed: true,
      rowPadding: 'byte',
    })
  })
})

describe('loadPcfFont - failures', () => {
  it('rejects a bad signature', () => {
    const bytes = sampleFontBytes({ magic: [0x01, 0x66, 0x63, 0x71] })
    expect(errorKind(() => load(bytes))).toBe('UnsupportedFormat')
  })

  it('rejects a metrics count that differs from the glyph count', () => {
    expect(errorKind(() => load(sampleFontBytes({ metricsCount: 4 })))).toBe('CorruptedData')
  })

  it('rejects a compressed metrics count mismatch', () => {
    const bytes = sampleFontBytes({ compressedMetrics: true, metricsCount: 6 })
    expect(errorKind(() => load(bytes))).toBe('CorruptedData')
  })

  it('requires all four tables', () => {
    for (const table of ['bitmaps', 'metrics', 'encodings', 'accelerators'] as const) {
      expect(errorKind(() => load(sampleFontBytes({ omit: [table] })))).toBe('CorruptedData')
    }
  })

  it('rejects least significant byte first tables', () => {
    const bytes = sampleFontBytes({ formats: { bitmaps: PCF_BIT_MASK } })
    expect(errorKind(() => load(bytes))).toBe('UnsupportedFormat')
  })

  it('rejects least significant bit first tables', () => {
    const bytes = sampleFontBytes({ formats: { encodings: PCF_BYTE_MASK } })
    expect(errorKind(() => load(bytes))).toBe('UnsupportedFormat')
  })

  it('rejects bitmaps stored in units wider than a byte', () => {
    const bytes = sampleFontBytes({ formats: { bitmaps: MSB_FORMAT | (1 << 4) } })
    expect(errorKind(() => load(bytes))).toBe('UnsupportedFormat')
  })

  it('treats the reserved padding value as corruption', () => {
    const bytes = sampleFontBytes({ formats: { bitmaps: MSB_FORMAT | 3 } })
    expect(errorKind(() => load(bytes))).toBe('CorruptedData')
  })

  it('reports truncated data as an I/O failure', () => {
    const bytes = sampleFontBytes()
    expect(errorKind(() => load(new Uint8Array(0)))).toBe('Io')
    // Cuts the table directory short
    expect(errorKind(() => load(bytes.subarray(0, 20)))).toBe('Io')
    // Cuts the accelerators table, which comes last
    expect(errorKind(() => load(bytes.subarray(0, bytes.byteLength - 4)))).toBe('Io')
  })

  it('wraps errors thrown by the byte source', () => {
    const failure = new Error('device unplugged')
    const source: ByteSource = {
      position: 0,
      seek: () => true,
      skip: () => true,
      read: () => {
        throw failure
      },
    }

    let caught: unknown
    try {
      loadPcfFont(source)
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(PcfError)
    expect(caught instanceof PcfError && caught.kind).toBe('Io')
    expect(caught instanceof PcfError && caught.cause).toBe(failure)
  })
})

describe('loadPcfFontFromBytes', () => {
  it('loads plain data', () => {
    expect(loadPcfFontFromBytes(sampleFontBytes()).glyphCount).toBe(5)
  })

  it('loads from an ArrayBuffer', () => {
    const bytes = sampleFontBytes()
    const buffer = new ArrayBuffer(bytes.byteLength)
    new Uint8Array(buffer).set(bytes)
    expect(loadPcfFontFromBytes(buffer).glyphCount).toBe(5)
  })

  it('inflates gzip-compressed data', () => {
    const font = loadPcfFontFromBytes(gzipSync(sampleFontBytes()))
    expect(font.glyphCount).toBe(5)
    expect(font.glyphIndex(LETTER_A.codePoint)).toBe(3)
  })

  it('reports broken gzip data as an I/O failure', () => {
    const broken = Uint8Array.of(0x1f, 0x8b, 0x08, 0x00, 0x01, 0x02)
    expect(errorKind(() => loadPcfFontFromBytes(broken))).toBe('Io')
  })
})
