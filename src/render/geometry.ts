// Integer pixel geometry

export interface Point {
  x: number
  y: number
}

export interface Size {
  width: number
  height: number
}

export interface Rectangle {
  topLeft: Point
  size: Size
}

export interface Pixel<C> {
  point: Point
  color: C
}

export function point(x: number, y: number): Point {
  return { x, y }
}

export function rectangle(x: number, y: number, width: number, height: number): Rectangle {
  return { topLeft: { x, y }, size: { width, height } }
}

export function offsetPoint(p: Point, dx: number, dy: number): Point {
  return { x: p.x + dx, y: p.y + dy }
}
