// packages/node-runtime/src/FileByteSource.ts
import { open, type FileHandle } from 'node:fs/promises';
import { IOError } from '../../core/src/errors/index.js';
import type { RandomAccessSource } from '../../core/src/util/ByteSource.js';
import { assertSliceBounds } from '../../core/src/util/range.js';

/**
 * Random-access reads over an open file handle. Nothing is buffered, so the
 * container sections are read without loading the audio payload.
 */
export class FileByteSource implements RandomAccessSource {
  private constructor(
    private readonly fh: FileHandle,
    readonly length: number,
    readonly path: string,
  ) {}

  /**
   * @throws {IOError} when the file cannot be opened or is not a regular file
   */
  static async open(path: string): Promise<FileByteSource> {
    let fh: FileHandle;
    try {
      fh = await open(path, 'r');
    } catch (err) {
      throw new IOError(`Cannot open ${path}: ${describeFsError(err)}`);
    }
    try {
      const st = await fh.stat();
      if (!st.isFile()) throw new IOError(`Not a regular file: ${path}`);
      return new FileByteSource(fh, st.size, path);
    } catch (err) {
      await fh.close();
      if (err instanceof IOError) throw err;
      throw new IOError(`Cannot stat ${path}: ${describeFsError(err)}`);
    }
  }

  async read(offset: number, len: number): Promise<Uint8Array> {
    assertSliceBounds(this.length, offset, len);
    const out = new Uint8Array(len);
    let filled = 0;
    try {
      while (filled < len) {
        const { bytesRead } = await this.fh.read(out, filled, len - filled, offset + filled);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
    } catch (err) {
      throw new IOError(`Read failed on ${this.path}: ${describeFsError(err)}`);
    }
    if (filled !== len) {
      throw new IOError(`Short read on ${this.path}: wanted ${len} bytes at ${offset}, got ${filled}`);
    }
    return out;
  }

  /** always call after finishing */
  async close(): Promise<void> {
    await this.fh.close();
  }
}

export function describeFsError(err: unknown): string {
  if (err instanceof Error) {
    const code = Reflect.get(err, 'code');
    return typeof code === 'string' ? `${code} ${err.message}` : err.message;
  }
  return String(err);
}
