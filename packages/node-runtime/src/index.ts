// packages/node-runtime/src/index.ts
export { NcmDecoder } from '../../core/src/index.js';
export { FileByteSource } from './FileByteSource.js';
export { dumpFile, type DumpOptions, type DumpResult } from './dump.js';
export {
  BatchDriver,
  type BatchOptions,
  type BatchSummary,
  type DecodeTask,
  type TaskOutcome,
} from './batch/BatchDriver.js';
export { WorkerPool, type TaskHandler } from './pool/WorkerPool.js';
export { Channel } from './pool/Channel.js';
export { resolveBlockSize, resolvePoolSize } from './config.js';
export { canEmbedCover, embedCover } from './tags/embedCover.js';
export { createProgram, type ProgramIO } from './program.js';
