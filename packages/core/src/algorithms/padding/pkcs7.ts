/**
 * algorithms/padding/pkcs7.ts
 *
 * PKCS#7 padding for 16-byte cipher blocks.
 *
 * Layout:
 *   P || v × v     where 1 ≤ v ≤ 16
 *
 * The block cipher adapter runs with padding disabled, so the key block and
 * the metadata block are unpadded here after decryption.
 *
 * Example:
 *   const padded = pkcs7Pad(new Uint8Array([1, 2, 3]));   // 16 bytes, last 13 are 0x0d
 *   pkcs7PadSize(padded);                                // 3
 *   pkcs7Unpad(padded);                                  // Uint8Array [1, 2, 3]
 */
import { PaddingError } from '../../errors/index.js';

export const PKCS7_BLOCK_SIZE = 16;

/**
 * Length of `buf` once its padding is removed.
 * @throws {PaddingError} when the final byte is outside 1..16 or the trailer is not uniform
 */
export function pkcs7PadSize(buf: Uint8Array): number {
  const len = buf.length;
  if (len === 0) throw new PaddingError('Invalid PKCS#7 padding: empty buffer');

  const v = buf[len - 1];
  if (v === 0 || v > PKCS7_BLOCK_SIZE || v > len) {
    throw new PaddingError(`Invalid PKCS#7 padding length ${v}`);
  }
  for (let i = len - v; i < len; i++) {
    if (buf[i] !== v) throw new PaddingError('Invalid PKCS#7 padding bytes');
  }
  return len - v;
}

/** Copy of the unpadded prefix. */
export function pkcs7Unpad(buf: Uint8Array): Uint8Array {
  return buf.slice(0, pkcs7PadSize(buf));
}

export function pkcs7Pad(plain: Uint8Array): Uint8Array {
  const v   = PKCS7_BLOCK_SIZE - (plain.length % PKCS7_BLOCK_SIZE);
  const out = new Uint8Array(plain.length + v);
  out.set(plain);
  out.fill(v, plain.length);
  return out;
}
