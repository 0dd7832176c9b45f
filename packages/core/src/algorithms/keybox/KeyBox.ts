// packages/core/src/algorithms/keybox/KeyBox.ts
import { KEY_BOX_SIZE, KEY_MATERIAL_SKIP } from '../../config/defaults.js';
import { FormatError } from '../../errors/index.js';
import type { KeyBox, KeyMaterial } from '../../types/index.js';

/**
 * RC4-style key schedule over `keyMaterial[17..]`.
 * Each step swaps two entries, so the table stays a permutation of 0..255.
 *
 * @throws {FormatError} when fewer than 18 bytes of key material are supplied
 */
export function buildKeyBox(keyMaterial: KeyMaterial): KeyBox {
  if (keyMaterial.length <= KEY_MATERIAL_SKIP) {
    throw new FormatError(
      `Key material too short: ${keyMaterial.length} bytes (need more than ${KEY_MATERIAL_SKIP})`,
    );
  }
  const key = keyMaterial.subarray(KEY_MATERIAL_SKIP);

  const box = new Uint8Array(KEY_BOX_SIZE);
  for (let i = 0; i < KEY_BOX_SIZE; i++) box[i] = i;

  let last   = 0;
  let offset = 0;
  for (let i = 0; i < KEY_BOX_SIZE; i++) {
    const swap = box[i];
    const c    = (swap + last + key[offset]) & 0xff;
    offset = (offset + 1) % key.length;
    box[i] = box[c];
    box[c] = swap;
    last   = c;
  }
  return box;
}

/**
 * The payload keystream repeats every 256 bytes:
 *   ks[i] = box[(box[j] + box[(box[j] + j) & 0xff]) & 0xff],  j = (i + 1) & 0xff
 */
export function expandKeystream(keyBox: KeyBox): Uint8Array {
  if (keyBox.length !== KEY_BOX_SIZE) {
    throw new RangeError(`Key box must hold ${KEY_BOX_SIZE} entries, got ${keyBox.length}`);
  }
  const ks = new Uint8Array(KEY_BOX_SIZE);
  for (let i = 0; i < KEY_BOX_SIZE; i++) {
    const j = (i + 1) & 0xff;
    ks[i] = keyBox[(keyBox[j] + keyBox[(keyBox[j] + j) & 0xff]) & 0xff];
  }
  return ks;
}

/**
 * XOR one block with the keystream. Indices are relative to the block start,
 * so callers must cut blocks on 256-byte boundaries to stay aligned with the
 * stream. The transform is its own inverse.
 */
export function applyKeystream(block: Uint8Array, keystream: Uint8Array): Uint8Array {
  const out = new Uint8Array(block.length);
  for (let i = 0; i < block.length; i++) {
    out[i] = block[i] ^ keystream[i & 0xff];
  }
  return out;
}
