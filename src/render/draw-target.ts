// Pixel surfaces and glyph compositing

import { bytesPerRow } from '../pcf/rows'
import type { Pixel, Point, Rectangle } from './geometry'

/** Surface text is drawn onto. Errors thrown here propagate to the caller. */
export interface DrawTarget<C> {
  fillSolid(area: Rectangle, color: C): void
  drawIter(pixels: Iterable<Pixel<C>>): void
  boundingBox(): Rectangle
}

/**
 * How glyph bitmaps map onto colors, chosen once per draw from the colors
 * that are set. Background pixels are never painted per glyph; the style
 * fills the whole string box before any glyph is drawn.
 */
export type Compositor<C> =
  | { kind: 'foreground'; foreground: C }
  | { kind: 'background'; background: C }
  | { kind: 'both'; foreground: C; background: C }
  | { kind: 'neither' }

export function selectCompositor<C>(foreground?: C, background?: C): Compositor<C> {
  if (foreground !== undefined && background !== undefined) {
    return { kind: 'both', foreground, background }
  }
  if (foreground !== undefined) {
    return { kind: 'foreground', foreground }
  }
  if (background !== undefined) {
    return { kind: 'background', background }
  }
  return { kind: 'neither' }
}

export function fillBackground<C>(
  compositor: Compositor<C>,
  target: DrawTarget<C>,
  area: Rectangle
): void {
  switch (compositor.kind) {
    case 'background':
    case 'both':
      target.fillSolid(area, compositor.background)
      break
    case 'foreground':
    case 'neither':
      break
  }
}

/** Paint the set bits of a byte-padded, MSB-first bitmap with `origin` as its top left. */
export function blitGlyph<C>(
  compositor: Compositor<C>,
  target: DrawTarget<C>,
  bitmap: Uint8Array,
  width: number,
  origin: Point
): void {
  switch (compositor.kind) {
    case 'foreground':
    case 'both':
      target.drawIter(glyphPixels(bitmap, width, origin, compositor.foreground))
      break
    case 'background':
    case 'neither':
      break
  }
}

function* glyphPixels<C>(
  bitmap: Uint8Array,
  width: number,
  origin: Point,
  color: C
): Generator<Pixel<C>> {
  const rowBytes = bytesPerRow(width, 1)
  if (rowBytes === 0) return
  const height = Math.floor(bitmap.byteLength / rowBytes)

  for (let row = 0; row < height; row++) {
    const rowStart = row * rowBytes
    for (let x = 0; x < width; x++) {
      const byte = bitmap[rowStart + (x >> 3)]
      if ((byte & (0x80 >> (x & 7))) !== 0) {
        yield { point: { x: origin.x + x, y: origin.y + row }, color }
      }
    }
  }
}
