// Loading fonts from files and in-memory blobs, gzip or plain

import { readFileSync } from 'node:fs'
import type { ByteSource } from '../source/byte-source'
import { FileSource } from '../source/file-source'
import { inflateFontData, isGzip } from '../source/gzip'
import { MemorySource } from '../source/memory-source'
import type { PcfFont } from './font'
import { type LoadOptions, loadPcfFont } from './load'

/**
 * Load a font held in memory. gzip-compressed data is inflated first.
 */
export function loadPcfFontFromBytes(
  data: ArrayBuffer | Uint8Array,
  options?: LoadOptions
): PcfFont<MemorySource> {
  const input = data instanceof Uint8Array ? data : new Uint8Array(data)
  return loadPcfFont(new MemorySource(inflateFontData(input)), options)
}

/**
 * Open a font file. Plain files are read lazily through a `FileSource`; call
 * `close()` on the font when done. `.pcf.gz` files are inflated into memory.
 */
export function openPcfFile(path: string, options?: LoadOptions): PcfFont<ByteSource> {
  const source = new FileSource(path)
  try {
    const head = new Uint8Array(2)
    if (source.read(head) && isGzip(head)) {
      source.close()
      return loadPcfFontFromBytes(readFileSync(path), options)
    }
    return loadPcfFont(source, options)
  } catch (err) {
    source.close()
    throw err
  }
}
