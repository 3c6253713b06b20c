// In-memory pixel surface
// Drawing outside the buffer is clipped

import type { DrawTarget } from './draw-target'
import type { Pixel, Rectangle } from './geometry'

export class FrameBuffer<C> implements DrawTarget<C> {
  readonly width: number
  readonly height: number
  private readonly pixels: C[]

  constructor(width: number, height: number, fill: C) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`Invalid frame buffer size ${width}x${height}`)
    }
    this.width = width
    this.height = height
    this.pixels = new Array<C>(width * height).fill(fill)
  }

  get(x: number, y: number): C | undefined {
    if (!this.contains(x, y)) return undefined
    return this.pixels[y * this.width + x]
  }

  set(x: number, y: number, color: C): void {
    if (!this.contains(x, y)) return
    this.pixels[y * this.width + x] = color
  }

  clear(color: C): void {
    this.pixels.fill(color)
  }

  fillSolid(area: Rectangle, color: C): void {
    const x0 = Math.max(area.topLeft.x, 0)
    const y0 = Math.max(area.topLeft.y, 0)
    const x1 = Math.min(area.topLeft.x + area.size.width, this.width)
    const y1 = Math.min(area.topLeft.y + area.size.height, this.height)
    for (let y = y0; y < y1; y++) {
      this.pixels.fill(color, y * this.width + x0, y * this.width + Math.max(x1, x0))
    }
  }

  drawIter(pixels: Iterable<Pixel<C>>): void {
    for (const { point, color } of pixels) {
      this.set(point.x, point.y, color)
    }
  }

  boundingBox(): Rectangle {
    return { topLeft: { x: 0, y: 0 }, size: { width: this.width, height: this.height } }
  }

  /** One string per row, each pixel rendered by `render`. */
  lines(render: (color: C) => string): string[] {
    const lines: string[] = []
    for (let y = 0; y < this.height; y++) {
      let line = ''
      for (let x = 0; x < this.width; x++) {
        line += render(this.pixels[y * this.width + x])
      }
      lines.push(line)
    }
    return lines
  }

  private contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height
  }
}
