// gzip-compressed font containers (.pcf.gz)

import { gunzipSync } from 'node:zlib'
import { PcfError } from '../shared/errors'

const GZIP_ID1 = 0x1f
const GZIP_ID2 = 0x8b

export function isGzip(data: Uint8Array): boolean {
  return data.byteLength >= 2 && data[0] === GZIP_ID1 && data[1] === GZIP_ID2
}

// Returns the input untouched unless it carries the gzip magic
export function inflateFontData(data: Uint8Array): Uint8Array {
  if (!isGzip(data)) {
    return data
  }
  let result: Buffer
  try {
    result = gunzipSync(data)
  } catch (err) {
    throw new PcfError('Io', 'Failed to inflate gzip font data', { cause: err })
  }
  return new Uint8Array(result.buffer, result.byteOffset, result.byteLength)
}
