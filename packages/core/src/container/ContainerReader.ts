// packages/core/src/container/ContainerReader.ts
import { LAYOUT } from '../config/defaults.js';
import { FormatError } from '../errors/index.js';
import { readUint32LE } from '../util/bytes.js';
import type { RandomAccessSource } from '../util/ByteSource.js';

/**
 * Sequential cursor over a random-access source. Every read is checked
 * against the remaining bytes before it reaches the source.
 */
export class ContainerReader {
  #pos = 0;

  constructor(private readonly src: RandomAccessSource) {}

  get position(): number  { return this.#pos; }
  get remaining(): number { return this.src.length - this.#pos; }

  skip(n: number, what: string): void {
    this.ensure(n, what);
    this.#pos += n;
  }

  async readUint32LE(what: string): Promise<number> {
    const bytes = await this.read(LAYOUT.lengthBytes, what);
    return readUint32LE(bytes);
  }

  async read(len: number, what: string): Promise<Uint8Array> {
    this.ensure(len, what);
    const out = await this.src.read(this.#pos, len);
    this.#pos += len;
    return out;
  }

  /** Read a u32le length, then that many bytes. */
  async readSection(what: string): Promise<Uint8Array> {
    const len = await this.readUint32LE(`${what} length`);
    return this.read(len, what);
  }

  private ensure(len: number, what: string): void {
    if (len > this.remaining) {
      throw new FormatError(
        `Truncated container: ${what} needs ${len} bytes at offset ${this.#pos}, ${this.remaining} left`,
      );
    }
  }
}
