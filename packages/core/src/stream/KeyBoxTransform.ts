// packages/core/src/stream/KeyBoxTransform.ts
import { DEFAULT_BLOCK_SIZE } from '../config/defaults.js';
import { applyKeystream, expandKeystream } from '../algorithms/keybox/KeyBox.js';
import { ensureUint8Array, type ByteChunk } from '../util/convert.js';
import type { KeyBox } from '../types/index.js';

/**
 * TransformStream that:
 *   • collects payload bytes into fixed-size blocks
 *   • XORs each block with the key-box keystream (indices relative to the block)
 *   • emits every block as soon as it is complete; the short tail on flush
 */
export class KeyBoxTransform {
  private buffer = new Uint8Array(0);
  private readonly keystream: Uint8Array;

  constructor(
    keyBox: KeyBox,
    private readonly blockSize = DEFAULT_BLOCK_SIZE,
  ) {
    this.keystream = expandKeystream(keyBox);
  }

  toTransformStream(): TransformStream<ByteChunk, Uint8Array> {
    return new TransformStream({
      transform: async (chunk, ctl) => {
        this.transform(await ensureUint8Array(chunk), ctl);
      },
      flush: ctl => this.flush(ctl),
    });
  }

  private transform(
    bytes: Uint8Array,
    ctl: TransformStreamDefaultController<Uint8Array>,
  ) {
    const combined = new Uint8Array(this.buffer.length + bytes.length);
    combined.set(this.buffer);
    combined.set(bytes, this.buffer.length);

    let offset = 0;
    while (combined.length - offset >= this.blockSize) {
      const block = combined.subarray(offset, offset + this.blockSize);
      offset += this.blockSize;
      ctl.enqueue(applyKeystream(block, this.keystream));
    }

    this.buffer = combined.slice(offset);
  }

  private flush(ctl: TransformStreamDefaultController<Uint8Array>) {
    if (!this.buffer.length) return;
    ctl.enqueue(applyKeystream(this.buffer, this.keystream));
    this.buffer = new Uint8Array(0);
  }
}
