// File-backed byte source using positional reads
// Only the bytes a lookup touches are ever read from disk

import { closeSync, fstatSync, openSync, readSync } from 'node:fs'
import type { ByteSource } from './byte-source'

export class FileSource implements ByteSource {
  readonly length: number
  private fd: number | null
  private pos: number = 0

  constructor(path: string) {
    const fd = openSync(path, 'r')
    this.length = sizeOf(fd)
    this.fd = fd
  }

  get position(): number {
    return this.pos
  }

  get closed(): boolean {
    return this.fd === null
  }

  seek(offset: number): boolean {
    if (this.fd === null) return false
    if (!Number.isInteger(offset) || offset > this.length || offset < 0) {
      return false
    }
    this.pos = offset
    return true
  }

  skip(delta: number): boolean {
    return this.seek(this.pos + delta)
  }

  read(target: Uint8Array): boolean {
    if (this.fd === null) return false
    if (this.pos + target.byteLength > this.length) return false

    let done = 0
    while (done < target.byteLength) {
      const n = readSync(this.fd, target, done, target.byteLength - done, this.pos + done)
      if (n === 0) return false
      done += n
    }
    this.pos += done
    return true
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd)
      this.fd = null
    }
  }
}

function sizeOf(fd: number): number {
  try {
    return fstatSync(fd).size
  } catch (err) {
    closeSync(fd)
    throw err
  }
}
