import { ecb } from '@noble/ciphers/aes.js';
import { CryptoError } from '../../../errors/index.js';
import type { BlockCipher } from '../../../types/index.js';

/**
 * AES-128 in ECB mode with cipher-level padding disabled.
 *
 * ## Framing
 * - Input length must be a multiple of 16; callers strip PKCS#7 afterwards
 *   (see `pkcs7Unpad`).
 * - Blocks are independent, there is no IV.
 *
 * @remarks
 * The container mandates ECB for its key and metadata blocks. Backed by
 * `@noble/ciphers` since WebCrypto offers no ECB mode.
 */
export class AES128ECB implements BlockCipher {
  public static readonly KEY_LENGTH: number = 16;
  public static readonly BLOCK_SIZE: number = 16;

  public readonly BLOCK_SIZE = AES128ECB.BLOCK_SIZE;

  private key: Uint8Array | null = null;

  constructor(key?: Uint8Array) {
    if (key) this.setKey(key);
  }

  /**
   * @throws {CryptoError} unless the key is exactly 16 bytes
   */
  public setKey(key: Uint8Array): void {
    if (key.length !== AES128ECB.KEY_LENGTH) {
      throw new CryptoError(`AES-128 key must be ${AES128ECB.KEY_LENGTH} bytes, got ${key.length}`);
    }
    this.key = key.slice();
  }

  public zeroKey(): void {
    this.key?.fill(0);
    this.key = null;
  }

  /**
   * @throws {CryptoError} when no key is set or the ciphertext is not block aligned
   */
  public decrypt(cipher: Uint8Array): Uint8Array {
    if (cipher.length % AES128ECB.BLOCK_SIZE !== 0) {
      throw new CryptoError(
        `AES-ECB ciphertext length ${cipher.length} is not a multiple of ${AES128ECB.BLOCK_SIZE}`,
      );
    }
    try {
      return ecb(this.requireKey(), { disablePadding: true }).decrypt(cipher);
    } catch (err) {
      if (err instanceof CryptoError) throw err;
      throw new CryptoError(
        `AES-ECB decryption failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private requireKey(): Uint8Array {
    if (!this.key) throw new CryptoError('Decryption key not set');
    return this.key;
  }
}
