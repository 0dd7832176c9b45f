import type { MetadataDocument } from '../container/metadata.js';

export type { MetadataDocument };

/* ------------------------- Block cipher ------------------------------ */
export interface BlockCipher {
  readonly BLOCK_SIZE: number;
  setKey(key: Uint8Array): void;
  /** Raw block decryption; length must be a multiple of BLOCK_SIZE. */
  decrypt(cipher: Uint8Array): Uint8Array;
  zeroKey(): void;
}

/* ------------------------- Key schedule ------------------------------ */
/** Unpadded output of the key block; the first 17 bytes are a fixed tag. */
export type KeyMaterial = Uint8Array;

/** 256-entry byte permutation driving the payload keystream. */
export type KeyBox = Uint8Array;

/* ------------------------- Container views --------------------------- */
export interface SectionLengths {
  key      : number;
  metadata : number;
  cover    : number;
  payload  : number;
}

/** Everything before the audio payload, decrypted. */
export interface OpenedContainer {
  keyMaterial   : KeyMaterial;
  keyBox        : KeyBox;
  /** `null` iff the declared metadata length is zero */
  metadata      : MetadataDocument | null;
  /** `null` iff the declared image length is zero */
  cover         : Uint8Array | null;
  payloadOffset : number;
  lengths       : SectionLengths;
}

/** JSON-friendly summary returned by `inspect`. */
export interface ContainerInfo {
  magic         : boolean;
  format        : string | null;
  metadata      : MetadataDocument | null;
  coverLength   : number;
  payloadOffset : number;
  lengths       : SectionLengths;
}

export interface DecodedTrack {
  format   : string;
  metadata : MetadataDocument;
  cover    : Uint8Array | null;
  audio    : Uint8Array;
}
