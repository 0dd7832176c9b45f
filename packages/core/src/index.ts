// packages/core/src/index.ts

import {
  DEFAULT_BLOCK_SIZE,
  KEY_BOX_SIZE,
  LAYOUT,
  MAX_BLOCK_SIZE,
  NCM_MAGIC,
} from './config/defaults.js';
import { ContainerReader }           from './container/ContainerReader.js';
import { deriveKeyMaterial }         from './container/key.js';
import { decodeMetadata, describeTrack, type MetadataDocument } from './container/metadata.js';
import { buildKeyBox }               from './algorithms/keybox/KeyBox.js';
import { KeyBoxTransform }           from './stream/KeyBoxTransform.js';
import { ByteSource, type RandomAccessSource } from './util/ByteSource.js';
import { collectStream, singleChunkStream } from './util/stream.js';
import type { ByteChunk }            from './util/convert.js';
import {
  createLogger,
  type Logger,
  type LogSink,
  type Verbosity,
} from './util/logger.js';
import { ConfigError, FormatError } from './errors/index.js';
import type {
  ContainerInfo,
  DecodedTrack,
  KeyBox,
  OpenedContainer,
} from './types/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring NcmDecoder behaviour.
 */
export interface NcmDecoderOptions {
  /** Payload block size in bytes; positive multiple of 256, defaults to 32768 */
  blockSize? : number;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?   : Verbosity;
  /** Custom sink (receives formatted lines) or a ready-made logger */
  logger?    : LogSink | Logger;
}

export type NcmInput = Uint8Array | Blob | RandomAccessSource;

/**
 * NcmDecoder parses NCM containers and decrypts their audio payload.
 */
export class NcmDecoder {
  private blockSize : number;

  // diagnostics --------------------------------------------------------------
  private readonly log : Logger;

  constructor(opt: NcmDecoderOptions = {}) {
    this.blockSize = NcmDecoder.validateBlockSize(opt.blockSize ?? DEFAULT_BLOCK_SIZE);
    this.log = typeof opt.logger === 'function' || opt.logger === undefined
      ? createLogger(opt.verbose ?? 0, opt.logger)
      : opt.logger;
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /**
   * True if the input starts with the `CTENFDAM` magic. Decoding does not
   * require it; the header is treated as opaque.
   */
  static async isNcm(input: NcmInput): Promise<boolean> {
    const src = NcmDecoder.toSource(input);
    if (src.length < NCM_MAGIC.length) return false;
    const head = await src.read(0, NCM_MAGIC.length);
    return NCM_MAGIC.every((b, i) => head[i] === b);
  }

  /**
   * @throws {ConfigError} unless `bytes` is a positive multiple of 256 within limits
   */
  static validateBlockSize(bytes: number): number {
    if (!Number.isInteger(bytes) || bytes < KEY_BOX_SIZE || bytes % KEY_BOX_SIZE !== 0) {
      throw new ConfigError(`Invalid block size: ${bytes}. Must be a positive multiple of ${KEY_BOX_SIZE}.`);
    }
    if (bytes > MAX_BLOCK_SIZE) {
      throw new ConfigError(`Block size cannot exceed ${MAX_BLOCK_SIZE} bytes.`);
    }
    return bytes;
  }

  /**
   * Metadata is the only place the output extension comes from.
   * @throws {FormatError} when the container carries none
   */
  static requireMetadata(container: OpenedContainer): MetadataDocument {
    if (!container.metadata) {
      throw new FormatError('Container has no metadata; output format is unknown');
    }
    return container.metadata;
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Setters / getters
  // ════════════════════════════════════════════════════════════════════════

  setBlockSize(bytes: number): number {
    this.blockSize = NcmDecoder.validateBlockSize(bytes);
    return this.blockSize;
  }
  getBlockSize(): number                    { return this.blockSize; }

  setVerbose(level: Verbosity): void        { this.log.level = level; }
  getVerbose(): Verbosity                   { return this.log.level; }

  // ════════════════════════════════════════════════════════════════════════
  //  Container parsing
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Parse and decrypt every section before the audio payload.
   * @throws {FormatError} on truncated sections or short key material
   * @throws {CryptoError} on cipher or padding failures
   */
  async open(input: NcmInput): Promise<OpenedContainer> {
    const src = NcmDecoder.toSource(input);
    const rd  = new ContainerReader(src);

    rd.skip(LAYOUT.headerBytes, 'header');

    const keyBlock    = await rd.readSection('key block');
    this.log.log(3, `Key block: ${keyBlock.length} bytes`);
    const keyMaterial = deriveKeyMaterial(keyBlock);
    const keyBox      = buildKeyBox(keyMaterial);
    this.log.log(4, `Key material: ${keyMaterial.length} bytes`);

    const metaLen = await rd.readUint32LE('metadata length');
    let metadata: MetadataDocument | null = null;
    if (metaLen > 0) {
      metadata = decodeMetadata(await rd.read(metaLen, 'metadata block'));
      this.log.log(3, `Metadata: format=${metadata.format}${this.trackSuffix(metadata)}`);
    } else {
      this.log.log(3, 'Metadata: none');
    }

    rd.skip(LAYOUT.checksumBytes, 'checksum');

    const coverLen = await rd.readUint32LE('image length');
    const cover    = coverLen > 0 ? await rd.read(coverLen, 'cover image') : null;
    this.log.log(3, `Cover: ${coverLen} bytes`);

    const payloadOffset = rd.position;
    return {
      keyMaterial,
      keyBox,
      metadata,
      cover,
      payloadOffset,
      lengths: {
        key      : keyBlock.length,
        metadata : metaLen,
        cover    : coverLen,
        payload  : rd.remaining,
      },
    };
  }

  /**
   * Parse a container without touching the audio payload.
   */
  async inspect(input: NcmInput): Promise<ContainerInfo> {
    const src       = NcmDecoder.toSource(input);
    const container = await this.open(src);
    return {
      magic         : await NcmDecoder.isNcm(src),
      format        : container.metadata?.format ?? null,
      metadata      : container.metadata,
      coverLength   : container.lengths.cover,
      payloadOffset : container.payloadOffset,
      lengths       : container.lengths,
    };
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Payload
  // ════════════════════════════════════════════════════════════════════════

  /**
   * TransformStream turning encrypted payload bytes into audio bytes.
   * Blocks are cut every `blockSize` bytes of payload.
   */
  createPayloadStream(keyBox: KeyBox): TransformStream<ByteChunk, Uint8Array> {
    return new KeyBoxTransform(keyBox, this.blockSize).toTransformStream();
  }

  /**
   * Decode a whole container held in memory.
   * @throws {FormatError} when the container has no metadata
   */
  async decode(input: Uint8Array | Blob): Promise<DecodedTrack> {
    const container = await this.open(input);
    const metadata  = NcmDecoder.requireMetadata(container);

    const payload: ReadableStream<Uint8Array> = input instanceof Uint8Array
      ? singleChunkStream(input.subarray(container.payloadOffset))
      : input.slice(container.payloadOffset).stream();

    this.log.log(2, `Decrypting ${container.lengths.payload} payload bytes`);
    const audio = await collectStream(
      payload.pipeThrough(this.createPayloadStream(container.keyBox)),
    );

    return { format: metadata.format, metadata, cover: container.cover, audio };
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Helpers
  // ════════════════════════════════════════════════════════════════════════

  private trackSuffix(meta: MetadataDocument): string {
    const track = describeTrack(meta);
    return track ? `, track=${track}` : '';
  }

  private static toSource(input: NcmInput): RandomAccessSource {
    return input instanceof Uint8Array || input instanceof Blob
      ? new ByteSource(input)
      : input;
  }
}

export { ByteSource, type RandomAccessSource } from './util/ByteSource.js';
export { ContainerReader }                  from './container/ContainerReader.js';
export { deriveKeyMaterial }                from './container/key.js';
export {
  decodeMetadata,
  describeTrack,
  parseMetadataJson,
  MetadataSchema,
  type MetadataDocument,
} from './container/metadata.js';
export { buildKeyBox, expandKeystream, applyKeystream } from './algorithms/keybox/KeyBox.js';
export { pkcs7Pad, pkcs7PadSize, pkcs7Unpad } from './algorithms/padding/pkcs7.js';
export { AES128ECB }                        from './algorithms/encryption/aes-ecb/AES128ECB.js';
export { KeyBoxTransform }                  from './stream/KeyBoxTransform.js';
export { createLogger, toVerbosity, type Logger, type LogSink, type Verbosity } from './util/logger.js';
export * from './errors/index.js';
export * from './config/defaults.js';
export type * from './types/index.js';
