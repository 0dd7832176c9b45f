// packages/node-runtime/src/config.ts
import { availableParallelism } from 'node:os';
import { NcmDecoder } from '../../core/src/index.js';
import { DEFAULT_BLOCK_SIZE } from '../../core/src/config/defaults.js';
import { ConfigError } from '../../core/src/errors/index.js';

export const DEFAULT_OUTPUT_DIR = 'unlocked';
export const DEFAULT_SCAN_ROOT  = '.';
export const NCM_EXTENSION      = '.ncm';
export const COVER_EXTENSION    = '.jpg';
export const PARTIAL_SUFFIX     = '.part';

export const MIN_POOL_SIZE = 2;

/**
 * Explicit counts are taken as given; the default follows the hardware,
 * never below two workers.
 * @throws {ConfigError} for zero, negative or fractional counts
 */
export function resolvePoolSize(configured?: number): number {
  if (configured === undefined) {
    return Math.max(MIN_POOL_SIZE, availableParallelism());
  }
  if (!Number.isInteger(configured) || configured <= 0) {
    throw new ConfigError(`Thread count must be a positive integer, got ${configured}`);
  }
  return configured;
}

/**
 * @throws {ConfigError} unless the size is a positive multiple of 256
 */
export function resolveBlockSize(configured?: number): number {
  return NcmDecoder.validateBlockSize(configured ?? DEFAULT_BLOCK_SIZE);
}
