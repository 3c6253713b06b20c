// Opened PCF font: glyph lookup, metrics and bitmap reads

import { u16be, u32be } from '../shared/bytes'
import { PcfError, isNotFound } from '../shared/errors'
import type { ByteSource } from '../source/byte-source'
import { SourceReader } from '../source/reader'
import {
  COMPRESSED_METRICS_SIZE,
  NO_GLYPH,
  STANDARD_METRICS_SIZE,
} from './constants'
import {
  type MetricsEntry,
  decodeCompressedMetrics,
  decodeStandardMetrics,
  glyphHeight,
  glyphWidth,
} from './metrics'
import { PADDING_UNITS, type RowPadding, bytesPerRow } from './rows'

/** Font-wide bounds of every glyph, relative to the baseline origin. */
export interface BoundingBox {
  width: number
  height: number
  xOffset: number
  /** Negated maximum descent. */
  yOffset: number
}

/** Valid two-byte code point domain, as in XFontStruct. */
export interface EncodingRange {
  minByte1: number
  maxByte1: number
  minCharOrByte2: number
  maxCharOrByte2: number
}

/** Absolute offsets derived while loading. */
export interface FontLayout {
  encodedGlyphIndices: number
  bitmapPositionLut: number
  bitmapData: number
  metricsData: number
}

export interface PcfFontInit<S extends ByteSource> {
  source: S
  glyphCount: number
  ascent: number
  descent: number
  metricsCompressed: boolean
  boundingBox: BoundingBox
  /** Extent of the largest stored bitmap, from the plain accelerator bounds. */
  glyphFootprint: { width: number; height: number }
  rowPadding: RowPadding
  encoding: EncodingRange
  defaultChar: number
  layout: FontLayout
}

export interface GlyphRaw {
  /** Bytes written to the caller's buffer. */
  length: number
  /** Bitmap width in pixels; rows are padded to whole bytes. */
  width: number
  metrics: MetricsEntry
}

export interface FontSummary {
  glyphCount: number
  ascent: number
  descent: number
  boundingBox: BoundingBox
  metricsCompressed: boolean
  rowPadding: RowPadding
}

/**
 * Handle to a loaded PCF font. Create one with `loadPcfFont`.
 *
 * Every lookup seeks the underlying source, so a handle must not be shared
 * between interleaved draws. Fork the source and load a second handle instead.
 */
export class PcfFont<S extends ByteSource = ByteSource> {
  readonly source: S
  private readonly reader: SourceReader
  private readonly count: number
  private readonly fontAscent: number
  private readonly fontDescent: number
  private readonly compressed: boolean
  private readonly bbox: Readonly<BoundingBox>
  private readonly footprint: Readonly<{ width: number; height: number }>
  private readonly padding: RowPadding
  private readonly encoding: Readonly<EncodingRange>
  private readonly layout: Readonly<FontLayout>
  private defaultCharCode: number

  /** @internal */
  constructor(init: PcfFontInit<S>) {
    this.source = init.source
    this.reader = new SourceReader(init.source, STANDARD_METRICS_SIZE)
    this.count = init.glyphCount
    this.fontAscent = init.ascent
    this.fontDescent = init.descent
    this.compressed = init.metricsCompressed
    this.bbox = { ...init.boundingBox }
    this.footprint = { ...init.glyphFootprint }
    this.padding = init.rowPadding
    this.encoding = { ...init.encoding }
    this.layout = { ...init.layout }
    this.defaultCharCode = init.defaultChar
  }

  get glyphCount(): number {
    return this.count
  }

  /** Pixels above the baseline of a typical ascender. */
  get ascent(): number {
    return this.fontAscent
  }

  /** Pixels below the baseline of a typical descender. */
  get descent(): number {
    return this.fontDescent
  }

  get boundingBox(): Readonly<BoundingBox> {
    return this.bbox
  }

  /** Rows of the bounding box above the baseline. */
  get maxAscent(): number {
    return this.bbox.height + this.bbox.yOffset
  }

  get rowPadding(): RowPadding {
    return this.padding
  }

  get metricsCompressed(): boolean {
    return this.compressed
  }

  get encodingRange(): Readonly<EncodingRange> {
    return this.encoding
  }

  get defaultChar(): number {
    return this.defaultCharCode
  }

  // Buffer size that fits any stored glyph; ink bounds may be tighter than the bitmaps
  maxBytesPerGlyph(): number {
    const width = Math.max(this.footprint.width, 0)
    const height = Math.max(this.footprint.height, 0)
    return bytesPerRow(width, 1) * height
  }

  overrideDefaultChar(codePoint: number): void {
    this.defaultCharCode = codePoint
  }

  hasGlyph(codePoint: number): boolean {
    try {
      this.glyphIndex(codePoint)
      return true
    } catch (err) {
      if (isNotFound(err)) return false
      throw err
    }
  }

  glyphIndex(codePoint: number): number {
    if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0xffff) {
      throw notFound(codePoint)
    }
    const enc1 = (codePoint >> 8) & 0xff
    const enc2 = codePoint & 0xff
    const { minByte1, maxByte1, minCharOrByte2, maxCharOrByte2 } = this.encoding
    if (enc1 < minByte1 || enc1 > maxByte1 || enc2 < minCharOrByte2 || enc2 > maxCharOrByte2) {
      throw notFound(codePoint)
    }

    // Same row-major layout for single and double byte encodings
    const cell = (enc1 - minByte1) * (maxCharOrByte2 - minCharOrByte2 + 1) + (enc2 - minCharOrByte2)
    const index = u16be(this.reader.readAt(this.layout.encodedGlyphIndices + cell * 2, 2))
    if (index === NO_GLYPH) {
      throw notFound(codePoint)
    }
    return index
  }

  glyphMetrics(codePoint: number): MetricsEntry {
    return this.metricsForIndex(this.glyphIndex(codePoint))
  }

  metricsForIndex(glyphIndex: number): MetricsEntry {
    this.checkIndex(glyphIndex)
    if (this.compressed) {
      const offset = this.layout.metricsData + glyphIndex * COMPRESSED_METRICS_SIZE
      return decodeCompressedMetrics(this.reader.readAt(offset, COMPRESSED_METRICS_SIZE))
    }
    const offset = this.layout.metricsData + glyphIndex * STANDARD_METRICS_SIZE
    return decodeStandardMetrics(this.reader.readAt(offset, STANDARD_METRICS_SIZE))
  }

  // Offset of a glyph's bitmap, relative to the start of bitmap data
  bitmapOffset(glyphIndex: number): number {
    this.checkIndex(glyphIndex)
    return u32be(this.reader.readAt(this.layout.bitmapPositionLut + glyphIndex * 4, 4))
  }

  /**
   * Read the bitmap of `codePoint` into `buf`, rows padded to whole bytes,
   * most significant bit first.
   *
   * A glyph may be empty (`length` 0) and still advance the pen. Size `buf`
   * with `maxBytesPerGlyph()`.
   */
  readGlyphRaw(codePoint: number, buf: Uint8Array): GlyphRaw {
    const glyphIndex = this.glyphIndex(codePoint)
    const bitmapOffset = this.bitmapOffset(glyphIndex)
    const metrics = this.metricsForIndex(glyphIndex)

    const width = glyphWidth(metrics)
    const height = glyphHeight(metrics)
    if (width < 0 || height < 0) {
      throw new PcfError(
        'CorruptedData',
        `Glyph ${glyphIndex} has negative extent ${width}x${height}`
      )
    }

    const sourceRowBytes = bytesPerRow(width, PADDING_UNITS[this.padding])
    const rowBytes = bytesPerRow(width, 1)
    const length = height * rowBytes
    if (length > buf.byteLength) {
      throw new PcfError(
        'Other',
        `Glyph ${glyphIndex} needs ${length} bytes, buffer holds ${buf.byteLength}`
      )
    }

    this.reader.seek(this.layout.bitmapData + bitmapOffset)
    const skipCount = sourceRowBytes - rowBytes
    for (let row = 0; row < height; row++) {
      const start = row * rowBytes
      this.reader.readInto(buf.subarray(start, start + rowBytes))
      if (skipCount > 0 && row + 1 < height) {
        this.reader.skip(skipCount)
      }
    }

    return { length, width, metrics }
  }

  close(): void {
    this.source.close?.()
  }

  describe(): FontSummary {
    return {
      glyphCount: this.count,
      ascent: this.fontAscent,
      descent: this.fontDescent,
      boundingBox: { ...this.bbox },
      metricsCompressed: this.compressed,
      rowPadding: this.padding,
    }
  }

  private checkIndex(glyphIndex: number): void {
    if (!Number.isInteger(glyphIndex) || glyphIndex < 0 || glyphIndex >= this.count) {
      throw new PcfError(
        'CorruptedData',
        `Glyph index ${glyphIndex} out of range (glyph count ${this.count})`
      )
    }
  }
}

function notFound(codePoint: number): PcfError {
  return new PcfError('NotFound', `No glyph for code point 0x${codePoint.toString(16)}`)
}
