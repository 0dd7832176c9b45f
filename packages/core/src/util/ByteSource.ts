// packages/core/src/util/ByteSource.ts
import { assertSliceBounds } from './range.js';

export interface RandomAccessSource {
  /** total length in bytes */
  readonly length: number;
  /**
   * return a copy of bytes `[offset, offset + len)`
   * throws if the range is out of bounds
   */
  read(offset: number, len: number): Promise<Uint8Array>;
}

/**
 * Random-access reader over a Blob or a Uint8Array.
 * Slices are read on‑demand so large Blobs are never loaded whole.
 */
export class ByteSource implements RandomAccessSource {
  constructor(private readonly src: Blob | Uint8Array) {}

  /** Total byte length of the underlying data */
  get length(): number {
    return this.src instanceof Uint8Array ? this.src.byteLength : this.src.size;
  }

  /**
   * Read a slice *[offset, offset + len)* as Uint8Array.
   * The returned view is a fresh copy the caller may mutate.
   */
  async read(offset: number, len: number): Promise<Uint8Array> {
    assertSliceBounds(this.length, offset, len);

    if (this.src instanceof Uint8Array) {
      return this.src.slice(offset, offset + len);
    }

    const buf = await this.src.slice(offset, offset + len).arrayBuffer();
    return new Uint8Array(buf);
  }
}
