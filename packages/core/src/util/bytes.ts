import { FormatError } from '../errors/index.js';

/**
 * Tiny run-time test - are we really in Node/Bun
 */
function isNodeLike(): boolean {
  return (
    typeof process !== 'undefined' &&
    typeof process.versions === 'object' &&
    // `browserify` & friends set `process.browser = true`
    Reflect.get(process, 'browser') !== true
  );
}

/* ------------------------------------------------------------------ */

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/** XOR every byte with a single-byte mask; returns a fresh buffer. */
export function xorMask(data: Uint8Array, mask: number): Uint8Array {
  const out = new Uint8Array(data.length);
  for (let i = 0; i < data.length; i++) out[i] = data[i] ^ mask;
  return out;
}

export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9A-Fa-f]*$/.test(hex)) {
    throw new FormatError(`Invalid hex string (length=${hex.length})`);
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function readUint32LE(buf: Uint8Array, off = 0): number {
  return new DataView(buf.buffer, buf.byteOffset + off, 4).getUint32(0, true);
}

export function encodeUint32LE(n: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, n, true);
  return out;
}

/* ----------  Base64 encode  --------------------------------------- */
export function base64Encode(...chunks: Uint8Array[]): string {
  const data = concat(...chunks);

  if (isNodeLike()) {
    return Buffer.from(data).toString('base64');
  }

  // Browser (skip any injected Buffer polyfill)
  let binary = '';
  for (let i = 0; i < data.length; i++) binary += String.fromCharCode(data[i]);
  return btoa(binary);
}

/* ----------  Base64 decode  --------------------------------------- */
export function base64Decode(b64: string): Uint8Array {
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(b64) || b64.length % 4 !== 0) {
    throw new FormatError(
      `Invalid Base64: length=${b64.length}, content='${b64.slice(0, 12)}…'`,
    );
  }

  if (isNodeLike()) {
    return new Uint8Array(Buffer.from(b64, 'base64'));
  }

  const bin = atob(b64);
  const out = new Uint8Array(bin.length);
  for (let i = 0; i < bin.length; i++) out[i] = bin.charCodeAt(i);
  return out;
}
