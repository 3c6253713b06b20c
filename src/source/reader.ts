// Checked reads over a ByteSource
// Every failure, returned or thrown by the source, surfaces as an Io error

import { PcfError } from '../shared/errors'
import type { ByteSource } from './byte-source'

export class SourceReader {
  private readonly source: ByteSource
  private readonly scratch: Uint8Array

  constructor(source: ByteSource, scratchSize: number = 16) {
    this.source = source
    this.scratch = new Uint8Array(scratchSize)
  }

  seek(offset: number): void {
    if (!this.attempt(() => this.source.seek(offset))) {
      throw new PcfError('Io', `Failed to seek to offset ${offset}`)
    }
  }

  skip(delta: number): void {
    if (!this.attempt(() => this.source.skip(delta))) {
      throw new PcfError('Io', `Failed to skip ${delta} bytes at offset ${this.source.position}`)
    }
  }

  /**
   * Read `length` bytes into the shared scratch area.
   * The returned view is overwritten by the next call.
   */
  read(length: number): Uint8Array {
    if (length > this.scratch.byteLength) {
      throw new PcfError('Other', `Read of ${length} bytes exceeds scratch size`)
    }
    const view = this.scratch.subarray(0, length)
    this.readInto(view)
    return view
  }

  readAt(offset: number, length: number): Uint8Array {
    this.seek(offset)
    return this.read(length)
  }

  readInto(target: Uint8Array): void {
    if (!this.attempt(() => this.source.read(target))) {
      throw new PcfError(
        'Io',
        `Failed to read ${target.byteLength} bytes at offset ${this.source.position}`
      )
    }
  }

  private attempt(op: () => boolean): boolean {
    try {
      return op()
    } catch (err) {
      throw new PcfError('Io', 'Byte source failed', { cause: err })
    }
  }
}
