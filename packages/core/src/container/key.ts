// packages/core/src/container/key.ts
import { CORE_KEY_HEX, KEY_XOR } from '../config/defaults.js';
import { AES128ECB } from '../algorithms/encryption/aes-ecb/AES128ECB.js';
import { pkcs7Unpad } from '../algorithms/padding/pkcs7.js';
import { hexToBytes, xorMask } from '../util/bytes.js';
import type { BlockCipher, KeyMaterial } from '../types/index.js';

/**
 * Recover the key material from the obfuscated key block:
 * XOR 0x64 → AES-128-ECB (core key) → PKCS#7 unpad.
 *
 * @throws {CryptoError} on cipher or padding failure
 */
export function deriveKeyMaterial(
  block: Uint8Array,
  cipher: BlockCipher = new AES128ECB(hexToBytes(CORE_KEY_HEX)),
): KeyMaterial {
  const plain = cipher.decrypt(xorMask(block, KEY_XOR));
  return pkcs7Unpad(plain);
}
