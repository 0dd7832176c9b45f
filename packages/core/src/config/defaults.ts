// packages/core/src/config/defaults.ts

/* ------------------------------------------------------------------ */
/*  Embedded AES-128 keys                                              */
/* ------------------------------------------------------------------ */
export const CORE_KEY_HEX = '687A4852416D736F356B496E62617857';
export const META_KEY_HEX = '2331346C6A6B5F215C5D2630553C2728';

/* ------------------------------------------------------------------ */
/*  Container layout                                                   */
/* ------------------------------------------------------------------ */
export const LAYOUT = {
  headerBytes  : 10,   // "CTENFDAM" + 2 opaque bytes
  lengthBytes  : 4,    // every section length is u32 little-endian
  checksumBytes: 9,    // crc32 (4) + gap (5)
} as const;

export const NCM_MAGIC = Uint8Array.of(0x43, 0x54, 0x45, 0x4e, 0x46, 0x44, 0x41, 0x4d);

export const KEY_XOR  = 0x64;
export const META_XOR = 0x63;

/** `163 key(Don't modify):` */
export const META_TEXT_PREFIX_BYTES = 22;
/** `music:` */
export const META_JSON_PREFIX_BYTES = 6;

/** `neteasecloudmusic` - skipped before the key schedule */
export const KEY_MATERIAL_SKIP = 17;

export const KEY_BOX_SIZE = 256;

/** Payload block size; keystream indices restart at every block boundary. */
export const DEFAULT_BLOCK_SIZE = 0x8000;
export const MAX_BLOCK_SIZE     = 64 * 1024 * 1024;
