// Loading
export { loadPcfFont, type LoadOptions } from './pcf/load'
export { loadPcfFontFromBytes, openPcfFile } from './pcf/open'
export {
  PcfFont,
  type BoundingBox,
  type EncodingRange,
  type FontSummary,
  type GlyphRaw,
} from './pcf/font'
export { type MetricsEntry, glyphHeight, glyphWidth } from './pcf/metrics'
export { bytesPerRow, type RowPadding } from './pcf/rows'
export { PcfError, type PcfErrorKind } from './shared/errors'

// Byte sources
export type { ByteSource } from './source/byte-source'
export { MemorySource } from './source/memory-source'
export { FileSource } from './source/file-source'

// Rendering
export {
  PcfFontStyle,
  PcfFontStyleBuilder,
  type Baseline,
  type DecorationColor,
  type TextMetrics,
} from './render/style'
export type { DrawTarget } from './render/draw-target'
export { FrameBuffer } from './render/frame-buffer'
export {
  point,
  rectangle,
  type Pixel,
  type Point,
  type Rectangle,
  type Size,
} from './render/geometry'
