// PCF container loader
// https://fontforge.org/docs/techref/pcf-format.html

import { s32be, u16be, u32be, u32le } from '../shared/bytes'
import { PcfError } from '../shared/errors'
import type { ByteSource } from '../source/byte-source'
import { SourceReader } from '../source/reader'
import {
  PCF_ACCELERATORS,
  PCF_ACCEL_W_INKBOUNDS,
  PCF_BDF_ACCELERATORS,
  PCF_BDF_ENCODINGS,
  PCF_BITMAPS,
  PCF_BIT_MASK,
  PCF_BYTE_MASK,
  PCF_COMPRESSED_METRICS,
  PCF_GLYPH_PAD_MASK,
  PCF_MAGIC,
  PCF_METRICS,
  PCF_SCAN_UNIT_MASK,
  STANDARD_METRICS_SIZE,
  TOC_ENTRY_SIZE,
} from './constants'
import { type BoundingBox, type EncodingRange, PcfFont } from './font'
import { type MetricsEntry, decodeStandardMetrics } from './metrics'
import { type RowPadding, paddingFromFormat } from './rows'

export interface LoadOptions {
  /** Replaces the font's own default character right after loading. */
  defaultChar?: number
}

interface TocEntry {
  format: number
  size: number
  offset: number
}

interface RequiredTables {
  bitmaps: TocEntry
  metrics: TocEntry
  encodings: TocEntry
  accelerators: TocEntry
}

interface BitmapInfo {
  glyphCount: number
  rowPadding: RowPadding
}

interface EncodingInfo {
  range: EncodingRange
  defaultChar: number
}

interface AcceleratorInfo {
  ascent: number
  descent: number
  boundingBox: BoundingBox
  footprint: BoundingBox
}

// Format fields are little-endian, payloads are read as big-endian
const MSB_FIRST = PCF_BYTE_MASK | PCF_BIT_MASK

/**
 * Check and load a PCF font from `source`.
 *
 * Only the table directory and a few headers are read here; glyphs are read
 * on demand. Fails with a `PcfError` and never returns a partial font.
 */
export function loadPcfFont<S extends ByteSource>(source: S, options?: LoadOptions): PcfFont<S> {
  const reader = new SourceReader(source, TOC_ENTRY_SIZE)

  reader.seek(0)
  const magic = reader.read(PCF_MAGIC.length)
  if (!PCF_MAGIC.every((byte, i) => magic[i] === byte)) {
    throw new PcfError('UnsupportedFormat', 'Invalid PCF signature')
  }

  const tables = readTableDirectory(reader)
  const bitmaps = readBitmapsHeader(reader, tables.bitmaps)
  const metricsCompressed = (tables.metrics.format & PCF_COMPRESSED_METRICS) !== 0
  readMetricsHeader(reader, tables.metrics, metricsCompressed, bitmaps.glyphCount)
  const encoding = readEncodingHeader(reader, tables.encodings)
  const accelerators = readAccelerators(reader, tables.accelerators)

  const bitmapPositionLut = tables.bitmaps.offset + 4 + 4
  const font = new PcfFont({
    source,
    glyphCount: bitmaps.glyphCount,
    ascent: accelerators.ascent,
    descent: accelerators.descent,
    metricsCompressed,
    boundingBox: accelerators.boundingBox,
    glyphFootprint: accelerators.footprint,
    rowPadding: bitmaps.rowPadding,
    encoding: encoding.range,
    defaultChar: encoding.defaultChar,
    layout: {
      encodedGlyphIndices: tables.encodings.offset + 4 + 5 * 2,
      bitmapPositionLut,
      // glyph offsets, then the four bitmapSizes
      bitmapData: bitmapPositionLut + (bitmaps.glyphCount + 4) * 4,
      metricsData: tables.metrics.offset + 4 + (metricsCompressed ? 2 : 4),
    },
  })

  if (options?.defaultChar !== undefined) {
    font.overrideDefaultChar(options.defaultChar)
  }
  return font
}

function readTableDirectory(reader: SourceReader): RequiredTables {
  const tableCount = u32le(reader.read(4))

  let bitmaps: TocEntry | null = null
  let metrics: TocEntry | null = null
  let encodings: TocEntry | null = null
  let accelerators: TocEntry | null = null
  let bdfAccelerators: TocEntry | null = null

  for (let i = 0; i < tableCount; i++) {
    const record = reader.read(TOC_ENTRY_SIZE)
    const type = u32le(record, 0)
    const entry: TocEntry = {
      format: u32le(record, 4),
      size: u32le(record, 8),
      offset: u32le(record, 12),
    }
    switch (type) {
      case PCF_BITMAPS:
        bitmaps = entry
        break
      case PCF_METRICS:
        metrics = entry
        break
      case PCF_BDF_ENCODINGS:
        encodings = entry
        break
      case PCF_BDF_ACCELERATORS:
        bdfAccelerators = entry
        break
      case PCF_ACCELERATORS:
        accelerators = entry
        break
      default:
        // Properties, ink metrics, swidths, glyph names and unknown kinds
        break
    }
  }

  // Both accelerator tables carry the fields read here
  return {
    bitmaps: requireTable('bitmaps', bitmaps),
    metrics: requireTable('metrics', metrics),
    encodings: requireTable('encodings', encodings),
    accelerators: requireTable('accelerators', bdfAccelerators ?? accelerators),
  }
}

function requireTable(name: string, entry: TocEntry | null): TocEntry {
  if (entry === null) {
    throw new PcfError('CorruptedData', `Missing ${name} table`)
  }
  if ((entry.format & MSB_FIRST) !== MSB_FIRST) {
    throw new PcfError(
      'UnsupportedFormat',
      `Table ${name} is not stored most significant byte and bit first (format 0x${entry.format.toString(16)})`
    )
  }
  return entry
}

function readBitmapsHeader(reader: SourceReader, table: TocEntry): BitmapInfo {
  if ((table.format & PCF_SCAN_UNIT_MASK) !== 0) {
    throw new PcfError('UnsupportedFormat', 'Bitmap scan unit other than bytes')
  }
  const rowPadding = paddingFromFormat(table.format & PCF_GLYPH_PAD_MASK)
  if (rowPadding === null) {
    throw new PcfError('CorruptedData', 'Reserved bitmap row padding value')
  }

  // Skip format
  reader.seek(table.offset + 4)
  const glyphCount = u32be(reader.read(4))
  // Glyph offsets, then bitmapSizes must be present
  reader.skip(glyphCount * 4)
  reader.read(16)

  return { glyphCount, rowPadding }
}

function readMetricsHeader(
  reader: SourceReader,
  table: TocEntry,
  compressed: boolean,
  glyphCount: number
): void {
  reader.seek(table.offset + 4)
  const metricsCount = compressed ? u16be(reader.read(2)) : u32be(reader.read(4))
  if (metricsCount !== glyphCount) {
    throw new PcfError(
      'CorruptedData',
      `Metrics count ${metricsCount} does not match glyph count ${glyphCount}`
    )
  }
}

function readEncodingHeader(reader: SourceReader, table: TocEntry): EncodingInfo {
  const fields = reader.readAt(table.offset + 4, 10)
  return {
    range: {
      minCharOrByte2: u16be(fields, 0),
      maxCharOrByte2: u16be(fields, 2),
      minByte1: u16be(fields, 4),
      maxByte1: u16be(fields, 6),
    },
    defaultChar: u16be(fields, 8),
  }
}

function readAccelerators(reader: SourceReader, table: TocEntry): AcceleratorInfo {
  // Skip format and the eight single-byte flags
  const fields = reader.readAt(table.offset + 4 + 8, 8)
  const ascent = s32be(fields, 0)
  const descent = s32be(fields, 4)
  // maxOverlap
  reader.skip(4)

  const minBounds = decodeStandardMetrics(reader.read(STANDARD_METRICS_SIZE))
  const maxBounds = decodeStandardMetrics(reader.read(STANDARD_METRICS_SIZE))
  // Every stored bitmap fits the plain bounds
  const footprint = boundsOf(minBounds, maxBounds)

  // Ink bounds follow the plain bounds and describe the visible pixels
  if ((table.format & PCF_ACCEL_W_INKBOUNDS) !== 0) {
    const inkMin = decodeStandardMetrics(reader.read(STANDARD_METRICS_SIZE))
    const inkMax = decodeStandardMetrics(reader.read(STANDARD_METRICS_SIZE))
    return { ascent, descent, boundingBox: boundsOf(inkMin, inkMax), footprint }
  }
  return { ascent, descent, boundingBox: footprint, footprint }
}

function boundsOf(min: MetricsEntry, max: MetricsEntry): BoundingBox {
  return {
    width: max.rightSideBearing - min.leftSideBearing,
    height: max.characterAscent + max.characterDescent,
    xOffset: min.leftSideBearing,
    yOffset: 0 - max.characterDescent,
  }
}
