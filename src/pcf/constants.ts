// PCF container constants
// https://fontforge.org/docs/techref/pcf-format.html

// "\x01fcp"
export const PCF_MAGIC: readonly number[] = [0x01, 0x66, 0x63, 0x70]

// Table types; only bitmaps, metrics, encodings and accelerators are read
export const PCF_PROPERTIES = 1 << 0
export const PCF_ACCELERATORS = 1 << 1
export const PCF_METRICS = 1 << 2
export const PCF_BITMAPS = 1 << 3
export const PCF_BDF_ENCODINGS = 1 << 5
export const PCF_SWIDTHS = 1 << 6
export const PCF_BDF_ACCELERATORS = 1 << 8

// Format field flags
export const PCF_ACCEL_W_INKBOUNDS = 0x00000100
export const PCF_COMPRESSED_METRICS = 0x00000100

// Row padding unit: 0 => bytes, 1 => shorts, 2 => ints
export const PCF_GLYPH_PAD_MASK = 3 << 0
// Most significant byte first
export const PCF_BYTE_MASK = 1 << 2
// Most significant bit first
export const PCF_BIT_MASK = 1 << 3
// Unit the bits are stored in: 0 => bytes, 1 => shorts, 2 => ints
export const PCF_SCAN_UNIT_MASK = 3 << 4

export const TOC_ENTRY_SIZE = 16
export const COMPRESSED_METRICS_SIZE = 5
export const STANDARD_METRICS_SIZE = 12

// Encoded index meaning "no glyph for this cell"
export const NO_GLYPH = 0xffff
