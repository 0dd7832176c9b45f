import { ecb } from '@noble/ciphers/aes.js';
import { AES128ECB } from '../../../src/algorithms/encryption/aes-ecb/AES128ECB.js';
import { CryptoError } from '../../../src/errors/index.js';

const KEY = new TextEncoder().encode('test-secret-0016');

function makePlain(len: number): Uint8Array {
  const u = new Uint8Array(len);
  for (let i = 0; i < len; i++) u[i] = (i * 31 + 7) & 0xff;
  return u;
}

describe('AES128ECB', () => {
  it('decrypts block-aligned ciphertext without touching padding', () => {
    const plain = makePlain(48);
    const ct    = ecb(KEY, { disablePadding: true }).encrypt(plain);

    const out = new AES128ECB(KEY).decrypt(ct);
    expect(out).toEqual(plain);
  });

  it('rejects keys that are not 16 bytes', () => {
    expect(() => new AES128ECB(new Uint8Array(15))).toThrow(CryptoError);
    expect(() => new AES128ECB(new Uint8Array(32))).toThrow(/must be 16 bytes, got 32/);
  });

  it('rejects unaligned ciphertext', () => {
    expect(() => new AES128ECB(KEY).decrypt(new Uint8Array(17))).toThrow(/not a multiple of 16/);
  });

  it('fails without a key and after zeroKey()', () => {
    expect(() => new AES128ECB().decrypt(new Uint8Array(16))).toThrow(/key not set/);

    const c = new AES128ECB(KEY);
    c.zeroKey();
    expect(() => c.decrypt(new Uint8Array(16))).toThrow(CryptoError);
  });

  it('copies the key on setKey()', () => {
    const key = KEY.slice();
    const c   = new AES128ECB(key);
    key.fill(0);

    const plain = makePlain(16);
    const ct    = ecb(KEY, { disablePadding: true }).encrypt(plain);
    expect(c.decrypt(ct)).toEqual(plain);
  });
});
