// Fixed-width integer decoding
// PCF table directories are little-endian, table payloads are big-endian here

export function u16le(data: Uint8Array, offset: number = 0): number {
  return data[offset] | (data[offset + 1] << 8)
}

export function s16le(data: Uint8Array, offset: number = 0): number {
  const val = u16le(data, offset)
  return (val & 0x8000) !== 0 ? val - 0x10000 : val
}

export function u32le(data: Uint8Array, offset: number = 0): number {
  return (
    (data[offset] |
      (data[offset + 1] << 8) |
      (data[offset + 2] << 16) |
      (data[offset + 3] << 24)) >>>
    0
  )
}

export function s32le(data: Uint8Array, offset: number = 0): number {
  return u32le(data, offset) | 0
}

export function u16be(data: Uint8Array, offset: number = 0): number {
  return (data[offset] << 8) | data[offset + 1]
}

export function s16be(data: Uint8Array, offset: number = 0): number {
  const val = u16be(data, offset)
  return (val & 0x8000) !== 0 ? val - 0x10000 : val
}

export function u32be(data: Uint8Array, offset: number = 0): number {
  return (
    (data[offset] * 0x1000000 +
      ((data[offset + 1] << 16) | (data[offset + 2] << 8) | data[offset + 3])) >>>
    0
  )
}

export function s32be(data: Uint8Array, offset: number = 0): number {
  return u32be(data, offset) | 0
}
