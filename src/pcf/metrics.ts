// Per-glyph metrics entries

import { s16be, u16be } from '../shared/bytes'

export interface MetricsEntry {
  leftSideBearing: number
  rightSideBearing: number
  characterWidth: number
  characterAscent: number
  characterDescent: number
  characterAttributes: number
}

const COMPRESSED_BIAS = 0x80

// Five unsigned bytes, each biased by 0x80; attributes are implied zero
export function decodeCompressedMetrics(data: Uint8Array, offset: number = 0): MetricsEntry {
  return {
    leftSideBearing: data[offset] - COMPRESSED_BIAS,
    rightSideBearing: data[offset + 1] - COMPRESSED_BIAS,
    characterWidth: data[offset + 2] - COMPRESSED_BIAS,
    characterAscent: data[offset + 3] - COMPRESSED_BIAS,
    characterDescent: data[offset + 4] - COMPRESSED_BIAS,
    characterAttributes: 0,
  }
}

export function decodeStandardMetrics(data: Uint8Array, offset: number = 0): MetricsEntry {
  return {
    leftSideBearing: s16be(data, offset),
    rightSideBearing: s16be(data, offset + 2),
    characterWidth: s16be(data, offset + 4),
    characterAscent: s16be(data, offset + 6),
    characterDescent: s16be(data, offset + 8),
    characterAttributes: u16be(data, offset + 10),
  }
}

export function glyphWidth(metrics: MetricsEntry): number {
  return metrics.rightSideBearing - metrics.leftSideBearing
}

export function glyphHeight(metrics: MetricsEntry): number {
  return metrics.characterAscent + metrics.characterDescent
}
