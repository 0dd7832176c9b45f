import {
  base64Encode,
  base64Decode,
  concat,
  encodeUint32LE,
  hexToBytes,
  readUint32LE,
  xorMask,
} from '../src/util/bytes.js';
import { FormatError } from '../src/errors/index.js';

describe('util/bytes helpers', () => {
  const a = new Uint8Array([1, 2, 3]);
  const b = new Uint8Array([4, 5]);

  it('concats arbitrary Uint8Arrays', () => {
    expect(Array.from(concat(a, b))).toEqual([1, 2, 3, 4, 5]);
  });

  it('base64 round-trips correctly', () => {
    const enc = base64Encode(a, b);
    expect(enc).toBe('AQIDBAU=');
    expect(Array.from(base64Decode(enc))).toEqual([1, 2, 3, 4, 5]);
  });

  it('throws FormatError on corrupt input', () => {
    expect(() => base64Decode('*not-b64*')).toThrow(FormatError);
  });

  it('throws FormatError when length is not a multiple of 4', () => {
    expect(() => base64Decode('Zm8')).toThrow(FormatError);
  });

  it('xors every byte and leaves the input untouched', () => {
    const src = new Uint8Array([0x00, 0x64, 0xff]);
    expect(Array.from(xorMask(src, 0x64))).toEqual([0x64, 0x00, 0x9b]);
    expect(Array.from(src)).toEqual([0x00, 0x64, 0xff]);
  });

  it('parses hex keys', () => {
    expect(Array.from(hexToBytes('687A48'))).toEqual([0x68, 0x7a, 0x48]);
    expect(() => hexToBytes('abc')).toThrow(FormatError);
    expect(() => hexToBytes('zz')).toThrow(FormatError);
  });

  it('reads and writes little-endian u32', () => {
    const enc = encodeUint32LE(0x01020304);
    expect(Array.from(enc)).toEqual([4, 3, 2, 1]);
    expect(readUint32LE(concat(new Uint8Array([9]), enc), 1)).toBe(0x01020304);
  });
});
