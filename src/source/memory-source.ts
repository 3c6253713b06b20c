// In-memory byte source with bounds checking

import type { ByteSource } from './byte-source'

export class MemorySource implements ByteSource {
  private u8: Uint8Array
  private pos: number = 0

  constructor(data: ArrayBuffer | Uint8Array, offset: number = 0, length?: number) {
    if (data instanceof Uint8Array) {
      const len = length ?? data.byteLength - offset
      this.u8 = data.subarray(offset, offset + len)
    } else {
      const len = length ?? data.byteLength - offset
      this.u8 = new Uint8Array(data, offset, len)
    }
  }

  get position(): number {
    return this.pos
  }

  get length(): number {
    return this.u8.byteLength
  }

  get remaining(): number {
    return this.u8.byteLength - this.pos
  }

  seek(offset: number): boolean {
    if (!Number.isInteger(offset) || offset > this.u8.byteLength || offset < 0) {
      return false
    }
    this.pos = offset
    return true
  }

  skip(delta: number): boolean {
    return this.seek(this.pos + delta)
  }

  read(target: Uint8Array): boolean {
    const end = this.pos + target.byteLength
    if (end > this.u8.byteLength) return false
    target.set(this.u8.subarray(this.pos, end))
    this.pos = end
    return true
  }

  // Independent cursor over the same bytes; no copy is made
  fork(): MemorySource {
    return new MemorySource(this.u8)
  }
}
