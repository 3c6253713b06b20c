// Random-access byte source contract

export interface ByteSource {
  readonly position: number
  /** Move the cursor to an absolute offset. */
  seek(offset: number): boolean
  /** Move the cursor relative to its current position; `delta` may be negative. */
  skip(delta: number): boolean
  /** Fill `target` completely from the cursor, or fail without a partial guarantee. */
  read(target: Uint8Array): boolean
  close?(): void
}
