// Small ASCII test font
//
// Bounds: lsb 0..1, rsb up to 10, ascent up to 7, descent up to 2, so the
// bounding box is 10x9 with yOffset -2 and a max ascent of 7.

import { type Bounds, type BuildOptions, type TestGlyph, buildPcf } from './pcf-builder'

export const SPACE: TestGlyph = {
  codePoint: 0x20,
  characterWidth: 4,
  characterAscent: 0,
  characterDescent: 0,
  rows: [],
}

export const HASH: TestGlyph = {
  codePoint: 0x23,
  leftSideBearing: 1,
  characterWidth: 11,
  characterAscent: 5,
  characterDescent: 0,
  rows: [
    '..#...#..',
    '#########',
    '..#...#..',
    '#########',
    '..#...#..',
  ],
}

export const QUESTION: TestGlyph = {
  codePoint: 0x3f,
  characterWidth: 5,
  characterAscent: 7,
  characterDescent: 0,
  rows: [
    '.##.',
    '#..#',
    '...#',
    '..#.',
    '.#..',
    '....',
    '.#..',
  ],
}

export const LETTER_A: TestGlyph = {
  codePoint: 0x41,
  characterWidth: 6,
  characterAscent: 7,
  characterDescent: 0,
  rows: [
    '..#..',
    '.#.#.',
    '#...#',
    '#...#',
    '#####',
    '#...#',
    '#...#',
  ],
}

export const LETTER_G: TestGlyph = {
  codePoint: 0x67,
  characterWidth: 5,
  characterAscent: 4,
  characterDescent: 2,
  rows: [
    '.###',
    '#..#',
    '#..#',
    '.###',
    '...#',
    '###.',
  ],
}

// Glyph indices follow this order
export const SAMPLE_GLYPHS: TestGlyph[] = [SPACE, HASH, QUESTION, LETTER_A, LETTER_G]

// Metrics are readable but the bitmap extent is negative, so only the bitmap read fails
export const INVERTED_B: TestGlyph = {
  codePoint: 0x42,
  leftSideBearing: 3,
  rightSideBearing: 1,
  characterWidth: 4,
  characterAscent: 0,
  characterDescent: 0,
  rows: [],
}

const NO_INK: Bounds = {
  leftSideBearing: 0,
  rightSideBearing: 0,
  characterWidth: 4,
  characterAscent: 0,
  characterDescent: 0,
}

// Ink bounds much tighter than the stored bitmaps: a 4x3 box
export const TIGHT_INK_BOUNDS: { min: Bounds; max: Bounds } = {
  min: NO_INK,
  max: { ...NO_INK, rightSideBearing: 4, characterAscent: 3 },
}

export function sampleFontBytes(options: Partial<BuildOptions> = {}): Uint8Array {
  return buildPcf({ glyphs: SAMPLE_GLYPHS, defaultChar: QUESTION.codePoint, ...options })
}
