// packages/core/src/container/metadata.ts
import { z } from 'zod';
import {
  META_JSON_PREFIX_BYTES,
  META_KEY_HEX,
  META_TEXT_PREFIX_BYTES,
  META_XOR,
} from '../config/defaults.js';
import { AES128ECB } from '../algorithms/encryption/aes-ecb/AES128ECB.js';
import { pkcs7Unpad } from '../algorithms/padding/pkcs7.js';
import { FormatError } from '../errors/index.js';
import { base64Decode, hexToBytes, xorMask } from '../util/bytes.js';
import type { BlockCipher } from '../types/index.js';

/** Optional tag: a value of the wrong shape is dropped instead of failing the file. */
function tag<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

const Id = z.union([z.number(), z.string()]);

export const MetadataSchema = z.object({
  format        : z.string().regex(/^[A-Za-z0-9]+$/, 'format must be a plain file extension'),
  musicId       : tag(Id),
  musicName     : tag(z.string()),
  artist        : tag(z.array(z.tuple([z.string(), Id]))),
  album         : tag(z.string()),
  albumId       : tag(Id),
  albumPic      : tag(z.string()),
  albumPicDocId : tag(Id),
  bitrate       : tag(z.number()),
  duration      : tag(z.number()),
  mp3DocId      : tag(z.string()),
  mvId          : tag(Id),
  alias         : tag(z.array(z.string())),
  transNames    : tag(z.array(z.string())),
}).passthrough();

export type MetadataDocument = z.infer<typeof MetadataSchema>;

const utf8 = new TextDecoder('utf-8');

/**
 * Decode the obfuscated metadata block:
 *   XOR 0x63 → drop `163 key(Don't modify):` → Base64 → AES-128-ECB (meta key)
 *   → PKCS#7 unpad → drop `music:` → JSON.
 *
 * @throws {FormatError} on truncated prefixes, bad Base64, bad JSON or a missing `format`
 * @throws {CryptoError} on cipher or padding failure
 */
export function decodeMetadata(
  block: Uint8Array,
  cipher: BlockCipher = new AES128ECB(hexToBytes(META_KEY_HEX)),
): MetadataDocument {
  if (block.length <= META_TEXT_PREFIX_BYTES) {
    throw new FormatError(`Metadata block too short: ${block.length} bytes`);
  }
  const text  = utf8.decode(xorMask(block, META_XOR).subarray(META_TEXT_PREFIX_BYTES));
  const plain = pkcs7Unpad(cipher.decrypt(base64Decode(text)));

  if (plain.length < META_JSON_PREFIX_BYTES) {
    throw new FormatError(`Decrypted metadata too short: ${plain.length} bytes`);
  }
  return parseMetadataJson(utf8.decode(plain.subarray(META_JSON_PREFIX_BYTES)));
}

export function parseMetadataJson(json: string): MetadataDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new FormatError(
      `Metadata is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = MetadataSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length ? issue.path.join('.') : '<root>';
    throw new FormatError(`Invalid metadata at ${where}: ${issue.message}`);
  }
  return parsed.data;
}

/** `Artist A, Artist B - Title`, or whatever part of it the tags carry. */
export function describeTrack(meta: MetadataDocument): string | null {
  const artists = meta.artist?.length ? meta.artist.map(([name]) => name).join(', ') : undefined;
  const title   = meta.musicName;
  if (artists && title) return `${artists} - ${title}`;
  return title ?? artists ?? null;
}
