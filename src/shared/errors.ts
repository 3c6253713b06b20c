/**
 * Error kinds raised while loading fonts and reading glyphs.
 *
 * - UnsupportedFormat: a recognised encoding variant this reader does not handle
 * - CorruptedData: the container contradicts itself (count mismatch, reserved values)
 * - NotFound: the code point has no glyph
 * - Io: the byte source failed, including reads past the end of truncated data
 * - Other: anything else, such as a glyph buffer that is too small
 */
export type PcfErrorKind = 'UnsupportedFormat' | 'CorruptedData' | 'NotFound' | 'Io' | 'Other'

export class PcfError extends Error {
  readonly kind: PcfErrorKind

  constructor(kind: PcfErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PcfError'
    this.kind = kind
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof PcfError && err.kind === 'NotFound'
}
