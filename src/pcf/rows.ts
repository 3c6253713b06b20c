// Glyph row padding

export type RowPadding = 'byte' | 'short' | 'int'

export const PADDING_UNITS: Readonly<Record<RowPadding, number>> = {
  byte: 1,
  short: 2,
  int: 4,
}

const PADDINGS: readonly RowPadding[] = ['byte', 'short', 'int']

// Padding bits of a bitmap table format; 3 is reserved
export function paddingFromFormat(bits: number): RowPadding | null {
  return PADDINGS[bits] ?? null
}

/**
 * Bytes taken by one row of `width` pixels once padded to a multiple of
 * `bytesAlign` bytes.
 */
export function bytesPerRow(width: number, bytesAlign: number): number {
  const unitAlignBits = bytesAlign * 8
  const blockCount = Math.floor((width + unitAlignBits - 1) / unitAlignBits)
  return blockCount * bytesAlign
}
