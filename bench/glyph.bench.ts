import { bench, describe } from 'vitest'
import { loadPcfFont } from '../src/pcf/load'
import { FrameBuffer } from '../src/render/frame-buffer'
import { PcfFontStyleBuilder } from '../src/render/style'
import { MemorySource } from '../src/source/memory-source'
import { type TestGlyph, buildPcf } from '../test/helpers/pcf-builder'

// Printable ASCII in an 8x13 cell, each glyph a pattern of its code point bits
function asciiGlyphs(): TestGlyph[] {
  const glyphs: TestGlyph[] = []
  for (let cp = 0x20; cp < 0x7f; cp++) {
    const rows: string[] = []
    for (let y = 0; y < 13; y++) {
      let row = ''
      for (let x = 0; x < 7; x++) {
        row += ((cp >> ((x + y) % 7)) & 1) === 1 ? '#' : '.'
      }
      rows.push(row)
    }
    glyphs.push({ codePoint: cp, characterWidth: 8, characterAscent: 10, characterDescent: 3, rows })
  }
  return glyphs
}

const text = 'The quick brown fox jumps over the lazy dog 0123456789'

const variants = [
  { label: 'byte padding', bytes: buildPcf({ glyphs: asciiGlyphs(), defaultChar: 0x3f }) },
  {
    label: 'int padding, compressed metrics',
    bytes: buildPcf({
      glyphs: asciiGlyphs(),
      defaultChar: 0x3f,
      padding: 'int',
      compressedMetrics: true,
    }),
  },
] as const

console.log('\n[bench] fixtures:')
for (const v of variants) {
  const summary = loadPcfFont(new MemorySource(v.bytes)).describe()
  console.log(`  ${v.label}: ${v.bytes.byteLength} bytes, ${summary.glyphCount} glyphs`)
}

describe('readGlyphRaw', () => {
  for (const v of variants) {
    const font = loadPcfFont(new MemorySource(v.bytes))
    const buf = new Uint8Array(font.maxBytesPerGlyph())
    bench(v.label, () => {
      for (let cp = 0x20; cp < 0x7f; cp++) {
        font.readGlyphRaw(cp, buf)
      }
    })
  }
})

describe('drawString', () => {
  for (const v of variants) {
    const font = loadPcfFont(new MemorySource(v.bytes))
    const style = new PcfFontStyleBuilder<number>(font).textColor(1).backgroundColor(0).build()
    const target = new FrameBuffer(text.length * 8, 13, 0)
    bench(v.label, () => {
      style.drawString(text, { x: 0, y: 0 }, 'top', target)
    })
  }
})
