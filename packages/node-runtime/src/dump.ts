// packages/node-runtime/src/dump.ts
import { createReadStream } from 'node:fs';
import { mkdir, open, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { NcmDecoder } from '../../core/src/index.js';
import { IOError, NcmError } from '../../core/src/errors/index.js';
import type { MetadataDocument } from '../../core/src/container/metadata.js';
import type { OpenedContainer } from '../../core/src/types/index.js';
import { createLogger, type Logger } from '../../core/src/util/logger.js';
import { COVER_EXTENSION, PARTIAL_SUFFIX } from './config.js';
import { FileByteSource, describeFsError } from './FileByteSource.js';
import { toWebReadable, toWebWritable } from './streamAdapter.js';
import { canEmbedCover, embedCover } from './tags/embedCover.js';

export interface DumpOptions {
  decoder?      : NcmDecoder;
  /** Write `<output-base>.jpg` when the container embeds a cover; default true */
  extractCover? : boolean;
  /** Put the cover into the audio file's tags (FLAC, MP3) and drop the `.jpg`; default false */
  embedCover?   : boolean;
  logger?       : Logger;
}

export interface DumpResult {
  input         : string;
  outputPath    : string;
  /** `null` when no cover was written or it ended up inside the audio tags */
  coverPath     : string | null;
  coverEmbedded : boolean;
  format        : string;
  metadata      : MetadataDocument;
  bytesWritten  : number;
}

// distinct temp names for writers racing on one target
let partCounter = 0;

/**
 * Decode one container file.
 *
 * `outputBase` carries no extension: the audio lands at
 * `<outputBase>.<format>`, the cover at `<outputBase>.jpg`. The audio is
 * written to a private `.part` file first and renamed once complete, so a
 * failed task never leaves a partial audio file behind.
 */
export async function dumpFile(
  input: string,
  outputBase: string,
  opts: DumpOptions = {},
): Promise<DumpResult> {
  const decoder = opts.decoder ?? new NcmDecoder();
  const log     = opts.logger ?? createLogger(0);

  const src = await FileByteSource.open(input);
  try {
    const container = await decoder.open(src);

    let coverPath: string | null = null;
    if (container.cover && (opts.extractCover ?? true)) {
      coverPath = `${outputBase}${COVER_EXTENSION}`;
      await writeOutput(coverPath, container.cover);
      log.log(3, `Cover written: ${coverPath}`);
    }

    const metadata   = NcmDecoder.requireMetadata(container);
    const outputPath = `${outputBase}.${metadata.format}`;
    await ensureParentDir(outputPath);

    let coverEmbedded = false;
    await writePayload(input, container, outputPath, decoder, log, tmp => {
      if (!opts.embedCover || !container.cover) return;
      coverEmbedded = tryEmbedCover(tmp, metadata.format, container.cover, log);
    });

    if (coverEmbedded && coverPath) {
      await rm(coverPath, { force: true });
      log.log(3, `Cover embedded, removed ${coverPath}`);
      coverPath = null;
    }

    return {
      input,
      outputPath,
      coverPath,
      coverEmbedded,
      format       : metadata.format,
      metadata,
      bytesWritten : container.lengths.payload,
    };
  } finally {
    try {
      await src.close();
    } catch (err) {
      log.log(0, `Could not close ${input}: ${describeFsError(err)}`);
    }
  }
}

/** A failed embedding keeps the audio and the `.jpg`; it is logged, not fatal. */
function tryEmbedCover(path: string, format: string, cover: Uint8Array, log: Logger): boolean {
  if (!canEmbedCover(format)) {
    log.log(2, `Cover kept as image: .${format} has no picture tag`);
    return false;
  }
  try {
    embedCover(path, format, cover);
    return true;
  } catch (err) {
    log.log(0, `Cover embedding failed: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}

async function writePayload(
  input: string,
  container: OpenedContainer,
  target: string,
  decoder: NcmDecoder,
  log: Logger,
  beforeCommit: (tmp: string) => void,
): Promise<void> {
  const tmp = `${target}.${process.pid}-${++partCounter}${PARTIAL_SUFFIX}`;
  try {
    const out    = await open(tmp, 'wx');
    const reader = createReadStream(input, {
      start         : container.payloadOffset,
      highWaterMark : decoder.getBlockSize(),
    });
    await toWebReadable(reader)
      .pipeThrough(decoder.createPayloadStream(container.keyBox))
      .pipeTo(toWebWritable(out.createWriteStream()));
    beforeCommit(tmp);
    await rename(tmp, target);
  } catch (err) {
    try {
      await rm(tmp, { force: true });
    } catch (cleanupErr) {
      log.log(0, `Could not remove partial file ${tmp}: ${describeFsError(cleanupErr)}`);
    }
    if (err instanceof NcmError) throw err;
    throw new IOError(`Writing ${target} failed: ${describeFsError(err)}`);
  }
}

async function writeOutput(path: string, bytes: Uint8Array): Promise<void> {
  await ensureParentDir(path);
  try {
    await writeFile(path, bytes);
  } catch (err) {
    throw new IOError(`Cannot write ${path}: ${describeFsError(err)}`);
  }
}

export async function ensureParentDir(path: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
  } catch (err) {
    throw new IOError(`Cannot create directory for ${path}: ${describeFsError(err)}`);
  }
}
