// packages/node-runtime/src/batch/BatchDriver.ts
import { mkdir } from 'node:fs/promises';
import { basename, dirname, join, parse } from 'node:path';
import { NcmDecoder } from '../../../core/src/index.js';
import { ConfigError, IOError, NcmError } from '../../../core/src/errors/index.js';
import {
  createLogger,
  type Logger,
  type LogSink,
  type Verbosity,
} from '../../../core/src/util/logger.js';
import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_SCAN_ROOT,
  NCM_EXTENSION,
  resolveBlockSize,
  resolvePoolSize,
} from '../config.js';
import { dumpFile, type DumpResult } from '../dump.js';
import { describeFsError } from '../FileByteSource.js';
import { WorkerPool } from '../pool/WorkerPool.js';
import { findFiles, readListFile } from './discovery.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public shapes
// ────────────────────────────────────────────────────────────────────────────

export interface BatchOptions {
  /** Worker count; defaults to the hardware parallelism (at least 2) */
  threads?      : number;
  /** Log the wall-clock time of the whole run */
  showTime?     : boolean;
  /** List file of input paths; empty or absent selects directory mode */
  inputList?    : string;
  /** List mode: list file of output bases. Directory mode: target directory */
  output?       : string;
  /** Directory mode: where to look for `.ncm` files */
  scanRoot?     : string;
  /** Directory mode: write each output beside its input instead of under `output` */
  inPlace?      : boolean;
  blockSize?    : number;
  extractCover? : boolean;
  /** Embed covers into FLAC/MP3 tags and drop the `.jpg` */
  embedCover?   : boolean;
  verbose?      : Verbosity;
  logger?       : LogSink | Logger;
}

export interface DecodeTask {
  input      : string;
  /** Output path without extension */
  outputBase : string;
}

export type TaskOutcome =
  | { ok: true;  task: DecodeTask; result: DumpResult; elapsedMs: number }
  | { ok: false; task: DecodeTask; error: Error;       elapsedMs: number };

export type BatchMode = 'list' | 'directory';

export interface BatchPlan {
  mode  : BatchMode;
  tasks : DecodeTask[];
}

export interface BatchSummary {
  mode      : BatchMode;
  threads   : number;
  total     : number;
  completed : number;
  succeeded : number;
  failed    : number;
  elapsedMs : number;
  outcomes  : TaskOutcome[];
}

/**
 * Builds the task list for one run and fans it out over a worker pool.
 * Configuration problems surface as ConfigError before any file is touched;
 * per-file failures are logged and counted.
 */
export class BatchDriver {
  private readonly log : Logger;

  constructor(private readonly opt: BatchOptions = {}) {
    this.log = typeof opt.logger === 'function' || opt.logger === undefined
      ? createLogger(opt.verbose ?? 1, opt.logger)
      : opt.logger;
  }

  async run(): Promise<BatchSummary> {
    const threads   = resolvePoolSize(this.opt.threads);
    const blockSize = resolveBlockSize(this.opt.blockSize);

    this.log.log(1, `Starting NCM processing with ${threads} threads`);
    this.log.log(3, 'Configuration:');
    this.log.log(3, `  Input file: ${this.opt.inputList || '<auto-detect>'}`);
    this.log.log(3, `  Output: ${this.opt.inPlace ? '<beside input>' : this.opt.output ?? DEFAULT_OUTPUT_DIR}`);
    this.log.log(3, `  Block size: ${blockSize}`);
    this.log.log(3, `  Show timing: ${this.opt.showTime ? 'true' : 'false'}`);

    const { mode, tasks } = await this.plan();

    const start = performance.now();
    let completed = 0;
    let outcomes: TaskOutcome[] = [];

    if (tasks.length === 0) {
      this.log.log(1, `No ${NCM_EXTENSION} files found to process.`);
    } else {
      this.log.log(1, `Processing ${tasks.length} files in ${mode} mode`);
      const pool = new WorkerPool<DecodeTask, TaskOutcome>(
        threads,
        (task, id) => this.process(task, id, blockSize),
      );
      outcomes = await pool.run(tasks, (_, n) => { completed = n; });
    }

    const elapsedMs = performance.now() - start;
    const succeeded = outcomes.filter(o => o.ok).length;

    this.log.log(1, 'Processing complete!');
    this.log.log(1, `Total files processed: ${completed} (${succeeded} ok, ${completed - succeeded} failed)`);
    if (this.opt.showTime) {
      this.log.log(1, `Total time elapsed: ${(elapsedMs / 1000).toFixed(3)}s`);
    }

    return {
      mode,
      threads,
      total     : tasks.length,
      completed,
      succeeded,
      failed    : completed - succeeded,
      elapsedMs,
      outcomes,
    };
  }

  /**
   * Resolve the (input, output base) pairs without decoding anything.
   * @throws {ConfigError} for unreadable, empty or mismatched lists
   */
  async plan(): Promise<BatchPlan> {
    if (this.opt.inputList && this.opt.inPlace) {
      throw new ConfigError('In-place output applies to directory mode only');
    }
    return this.opt.inputList
      ? { mode: 'list', tasks: await this.planFromLists(this.opt.inputList) }
      : { mode: 'directory', tasks: await this.planFromDirectory() };
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Helpers
  // ════════════════════════════════════════════════════════════════════════

  private async planFromLists(inputList: string): Promise<DecodeTask[]> {
    if (!this.opt.output) throw new ConfigError('List mode needs an output list file');

    const inputs  = await readListFile(inputList);
    const outputs = await readListFile(this.opt.output);
    this.log.log(2, `Read ${inputs.length} lines from ${inputList}`);
    this.log.log(2, `Read ${outputs.length} lines from ${this.opt.output}`);

    if (inputs.length === 0 || outputs.length === 0) {
      throw new ConfigError('Input or output file list is empty.');
    }
    if (inputs.length !== outputs.length) {
      throw new ConfigError(
        `Input and output file lists must have the same number of lines ` +
        `(input: ${inputs.length}, output: ${outputs.length})`,
      );
    }
    const seen = new Set<string>();
    for (const base of outputs) {
      if (seen.has(base)) {
        throw new ConfigError(`Output list names ${base} more than once`);
      }
      seen.add(base);
    }
    return inputs.map((input, i) => ({ input, outputBase: outputs[i] }));
  }

  private async planFromDirectory(): Promise<DecodeTask[]> {
    const root   = this.opt.scanRoot ?? DEFAULT_SCAN_ROOT;
    const target = this.opt.output || DEFAULT_OUTPUT_DIR;

    if (!this.opt.inPlace) {
      try {
        await mkdir(target, { recursive: true });
      } catch (err) {
        throw new ConfigError(`Cannot create output directory ${target}: ${describeFsError(err)}`);
      }
    }

    const files = await findFiles(root, NCM_EXTENSION);
    this.log.log(2, `Found ${files.length} ${NCM_EXTENSION} files under ${root}`);

    const taken = new Set<string>();
    return files.map(input => {
      const wanted     = join(this.opt.inPlace ? dirname(input) : target, parse(input).name);
      const outputBase = uniqueBase(wanted, taken);
      if (outputBase !== wanted) {
        this.log.log(2, `Name clash for ${input}, writing to ${outputBase}`);
      }
      return { input, outputBase };
    });
  }

  private async process(task: DecodeTask, workerId: number, blockSize: number): Promise<TaskOutcome> {
    const log   = this.log.scoped(`w${workerId}`);
    const name  = basename(task.input);
    const start = performance.now();
    log.log(2, `Processing: ${name}`);

    try {
      const result = await dumpFile(task.input, task.outputBase, {
        decoder      : new NcmDecoder({ blockSize, logger: log }),
        extractCover : this.opt.extractCover ?? true,
        embedCover   : this.opt.embedCover ?? false,
        logger       : log,
      });
      const elapsedMs = performance.now() - start;
      log.log(2, `Completed: ${name} -> ${result.outputPath} (${elapsedMs.toFixed(0)}ms)`);
      return { ok: true, task, result, elapsedMs };
    } catch (err) {
      const error = toTaskError(err);
      log.log(0, `Error processing ${task.input}: [${error.name}] ${error.message}`);
      return { ok: false, task, error, elapsedMs: performance.now() - start };
    }
  }
}

/** `base`, or `base (1)`, `base (2)`, ... when an earlier task already claimed it. */
function uniqueBase(base: string, taken: Set<string>): string {
  let candidate = base;
  for (let n = 1; taken.has(candidate); n++) candidate = `${base} (${n})`;
  taken.add(candidate);
  return candidate;
}

/** Filesystem errors become IOError; other foreign errors keep their class. */
function toTaskError(err: unknown): Error {
  if (err instanceof NcmError) return err;
  if (err instanceof Error) {
    return typeof Reflect.get(err, 'code') === 'string'
      ? new IOError(describeFsError(err))
      : err;
  }
  return new Error(String(err));
}
