// Text layout and rendering with PCF fonts

import type { PcfFont } from '../pcf/font'
import type { MetricsEntry } from '../pcf/metrics'
import { PcfError } from '../shared/errors'
import {
  type Compositor,
  type DrawTarget,
  blitGlyph,
  fillBackground,
  selectCompositor,
} from './draw-target'
import { type Point, type Rectangle, offsetPoint, rectangle } from './geometry'

/**
 * Vertical anchor of the position passed to draw and measure calls.
 *
 * - top: the anchor pixel is the top row of the font bounding box
 * - bottom: the anchor pixel is the bottom row of the font bounding box
 * - middle: the lower edge of the anchor pixel splits the box, the lower half may be larger
 * - alphabetic: the lower edge of the anchor pixel is the font baseline
 */
export type Baseline = 'top' | 'bottom' | 'middle' | 'alphabetic'

export type DecorationColor<C> =
  | { kind: 'none' }
  | { kind: 'custom'; color: C }
  // Follows the text color
  | { kind: 'text' }

export interface TextMetrics {
  boundingBox: Rectangle
  nextPosition: Point
}

type GlyphResult<T> = { ok: true; value: T } | { ok: false; error: PcfError }

// Code point that resolved, after any fallback, and the metrics it advances by
interface ResolvedGlyph {
  codePoint: number
  metrics: MetricsEntry
}

export class PcfFontStyle<C> {
  textColor: C | undefined = undefined
  backgroundColor: C | undefined = undefined
  underlineColor: DecorationColor<C> = { kind: 'none' }
  strikethroughColor: DecorationColor<C> = { kind: 'none' }
  readonly font: PcfFont
  private readonly glyphBuffer: Uint8Array

  /** All colors transparent and decorations disabled. */
  constructor(font: PcfFont) {
    this.font = font
    this.glyphBuffer = new Uint8Array(font.maxBytesPerGlyph())
  }

  isTransparent(): boolean {
    return (
      this.textColor === undefined &&
      this.backgroundColor === undefined &&
      this.underlineColor.kind === 'none' &&
      this.strikethroughColor.kind === 'none'
    )
  }

  setTextColor(color: C | undefined): void {
    this.textColor = color
  }

  setBackgroundColor(color: C | undefined): void {
    this.backgroundColor = color
  }

  setUnderlineColor(color: DecorationColor<C>): void {
    this.underlineColor = color
  }

  setStrikethroughColor(color: DecorationColor<C>): void {
    this.strikethroughColor = color
  }

  lineHeight(): number {
    return this.font.boundingBox.height
  }

  /**
   * Draw `text` with its anchor at `position` and return where the next
   * string should start. Characters without a glyph fall back to the
   * font's default character, and are skipped with zero width when that
   * fails as well.
   */
  drawString(text: string, position: Point, baseline: Baseline, target: DrawTarget<C>): Point {
    const offset = this.baselineOffset(baseline)
    const start = offsetPoint(position, 0, offset)
    const compositor = selectCompositor(this.textColor, this.backgroundColor)

    let next: Point
    if (compositor.kind === 'neither') {
      next = offsetPoint(start, this.advanceWidth(text), 0)
    } else {
      // Glyphs don't necessarily cover their whole cell, so the box is filled up front
      const box = this.textBox(text, start)
      if (box !== null) {
        fillBackground(compositor, target, box)
      }
      next = this.drawGlyphs(text, start, compositor, target)
    }

    if (next.x > start.x) {
      this.drawDecorations(next.x - start.x, start, target)
    }

    return offsetPoint(next, 0, -offset)
  }

  /** Advance over a gap of `width` pixels, filling background and decorations. */
  drawWhitespace(width: number, position: Point, baseline: Baseline, target: DrawTarget<C>): Point {
    if (width <= 0) {
      return { ...position }
    }

    const offset = this.baselineOffset(baseline)
    const { height } = this.font.boundingBox
    const maxAscent = this.font.maxAscent
    const top = offsetPoint(position, 0, offset - maxAscent)
    if (this.backgroundColor !== undefined) {
      target.fillSolid(rectangle(top.x, top.y, width, height), this.backgroundColor)
    }

    this.drawDecorations(width, offsetPoint(position, 0, offset), target)
    return offsetPoint(position, width, 0)
  }

  measureString(text: string, position: Point, baseline: Baseline): TextMetrics {
    const offset = this.baselineOffset(baseline)
    const box = this.textBox(text, position)
    const boundingBox =
      box !== null
        ? { topLeft: offsetPoint(box.topLeft, 0, offset), size: box.size }
        : {
            topLeft: offsetPoint(position, 0, offset - this.baselineOffset('top')),
            size: { width: 0, height: 0 },
          }

    // Decorations stay within the box and don't change its height
    return {
      boundingBox,
      nextPosition: offsetPoint(position, boundingBox.size.width, 0),
    }
  }

  // Distance from the anchor down to the row glyph ascents are measured from.
  // The 1s make the lower edge of the anchor pixel the alphabetic baseline.
  baselineOffset(baseline: Baseline): number {
    const { height, yOffset } = this.font.boundingBox
    switch (baseline) {
      case 'top':
        return this.font.maxAscent
      case 'bottom':
        return 1 + yOffset
      case 'middle':
        return 1 + Math.trunc(height / 2) + yOffset
      case 'alphabetic':
        return 1
    }
  }

  private drawGlyphs(
    text: string,
    start: Point,
    compositor: Compositor<C>,
    target: DrawTarget<C>
  ): Point {
    let x = start.x
    for (const ch of text) {
      const result = this.resolve(codePointOf(ch))
      if (!result.ok) {
        continue
      }

      const { codePoint, metrics } = result.value
      // A bitmap that can't be read is left out; the pen still advances
      const raw = attempt(() => this.font.readGlyphRaw(codePoint, this.glyphBuffer))
      if (raw.ok && raw.value.length > 0) {
        const origin = { x: x + metrics.leftSideBearing, y: start.y - metrics.characterAscent }
        const bitmap = this.glyphBuffer.subarray(0, raw.value.length)
        blitGlyph(compositor, target, bitmap, raw.value.width, origin)
      }
      x += metrics.characterWidth
    }
    return { x, y: start.y }
  }

  private advanceWidth(text: string): number {
    let width = 0
    for (const ch of text) {
      const result = this.resolve(codePointOf(ch))
      if (result.ok) {
        width += result.value.metrics.characterWidth
      }
    }
    return width
  }

  // Box covering the string's cells; `start` is already shifted to the baseline
  private textBox(text: string, start: Point): Rectangle | null {
    if (text.length === 0) {
      return null
    }
    const top = start.y - this.font.maxAscent
    return rectangle(start.x, top, this.advanceWidth(text), this.font.boundingBox.height)
  }

  private drawDecorations(width: number, position: Point, target: DrawTarget<C>): void {
    const strikethrough = this.decorationColor(this.strikethroughColor)
    if (strikethrough !== undefined) {
      const y = position.y - this.baselineOffset('middle')
      target.fillSolid(rectangle(position.x, y, width, 1), strikethrough)
    }

    // Underline sits on the bottom row of the bounding box
    const underline = this.decorationColor(this.underlineColor)
    if (underline !== undefined) {
      const y = position.y - this.baselineOffset('bottom')
      target.fillSolid(rectangle(position.x, y, width, 1), underline)
    }
  }

  private decorationColor(decoration: DecorationColor<C>): C | undefined {
    switch (decoration.kind) {
      case 'none':
        return undefined
      case 'custom':
        return decoration.color
      case 'text':
        return this.textColor
    }
  }

  // NotFound retries once with the default character; any other failure skips the character
  private resolve(codePoint: number): GlyphResult<ResolvedGlyph> {
    const first = this.lookup(codePoint)
    if (first.ok || first.error.kind !== 'NotFound') {
      return first
    }
    return this.lookup(this.font.defaultChar)
  }

  private lookup(codePoint: number): GlyphResult<ResolvedGlyph> {
    return attempt(() => ({ codePoint, metrics: this.font.glyphMetrics(codePoint) }))
  }
}

/** Fluent construction of a `PcfFontStyle`. */
export class PcfFontStyleBuilder<C> {
  private readonly font: PcfFont
  private textColorValue: C | undefined = undefined
  private backgroundColorValue: C | undefined = undefined
  private underlineValue: DecorationColor<C> = { kind: 'none' }
  private strikethroughValue: DecorationColor<C> = { kind: 'none' }

  constructor(font: PcfFont) {
    this.font = font
  }

  textColor(color: C): this {
    this.textColorValue = color
    return this
  }

  backgroundColor(color: C): this {
    this.backgroundColorValue = color
    return this
  }

  /** Underline in the text color. */
  underline(): this {
    this.underlineValue = { kind: 'text' }
    return this
  }

  underlineWithColor(color: C): this {
    this.underlineValue = { kind: 'custom', color }
    return this
  }

  /** Strikethrough in the text color. */
  strikethrough(): this {
    this.strikethroughValue = { kind: 'text' }
    return this
  }

  strikethroughWithColor(color: C): this {
    this.strikethroughValue = { kind: 'custom', color }
    return this
  }

  resetTextColor(): this {
    this.textColorValue = undefined
    return this
  }

  resetBackgroundColor(): this {
    this.backgroundColorValue = undefined
    return this
  }

  resetUnderline(): this {
    this.underlineValue = { kind: 'none' }
    return this
  }

  resetStrikethrough(): this {
    this.strikethroughValue = { kind: 'none' }
    return this
  }

  build(): PcfFontStyle<C> {
    const style = new PcfFontStyle<C>(this.font)
    style.setTextColor(this.textColorValue)
    style.setBackgroundColor(this.backgroundColorValue)
    style.setUnderlineColor(this.underlineValue)
    style.setStrikethroughColor(this.strikethroughValue)
    return style
  }
}

function attempt<T>(read: () => T): GlyphResult<T> {
  try {
    return { ok: true, value: read() }
  } catch (err) {
    if (err instanceof PcfError) {
      return { ok: false, error: err }
    }
    throw err
  }
}

function codePointOf(ch: string): number {
  return ch.codePointAt(0) ?? 0
}
