// packages/core/src/util/convert.ts
export type ByteChunk = Uint8Array | ArrayBuffer | ArrayBufferView | Blob;

/** Normalise whatever a stream hands us into a byte view (no copy where possible). */
export async function ensureUint8Array(src: ByteChunk): Promise<Uint8Array> {
  if (src instanceof Uint8Array)  return src;
  if (src instanceof ArrayBuffer) return new Uint8Array(src);
  if (ArrayBuffer.isView(src))    return new Uint8Array(src.buffer, src.byteOffset, src.byteLength);
  return new Uint8Array(await src.arrayBuffer());
}
