import { Readable, Writable } from 'node:stream';

/** Convert Node streams to WHATWG streams in one place */
export function toWebReadable(r: Readable): ReadableStream<Uint8Array> {
  const web: ReadableStream<Uint8Array> = Readable.toWeb(r);
  return web;
}
export function toWebWritable(w: Writable): WritableStream<Uint8Array> {
  const web: WritableStream<Uint8Array> = Writable.toWeb(w);
  return web;
}
