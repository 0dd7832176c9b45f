// packages/node-runtime/src/program.ts
import { Command, Option } from 'commander';
import { NcmDecoder } from '../../core/src/index.js';
import { DEFAULT_BLOCK_SIZE } from '../../core/src/config/defaults.js';
import { createLogger, toVerbosity, type LogSink } from '../../core/src/util/logger.js';
import { BatchDriver, type BatchSummary } from './batch/BatchDriver.js';
import { DEFAULT_OUTPUT_DIR, DEFAULT_SCAN_ROOT } from './config.js';
import { FileByteSource } from './FileByteSource.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

export interface ProgramIO {
  stdout : (text: string) => void;
  stderr : (text: string) => void;
  /** Receives the summary of every batch run (tests, embedding callers) */
  onSummary? : (summary: BatchSummary) => void;
}

interface RootOptions {
  threads?  : number;
  showtime  : boolean;
  input     : string;
  output    : string;
  root      : string;
  blockSize : number;
  cover     : boolean;
  embedCover: boolean;
  inPlace   : boolean;
  verbose   : number;
}

function nonNegativeInt(what: string) {
  return (v: string): number => {
    const n = Number(v);
    if (!Number.isInteger(n) || n < 0) {
      throw new Error(`${what} must be a non-negative integer`);
    }
    return n;
  };
}

export function createProgram(io: ProgramIO): Command {
  const program = new Command();
  const sink: LogSink = line => io.stderr(line + '\n');

  program
    .name('ncmpp')
    .version(PKG_VERSION)
    .description(
      'Batch NCM decoder\n' +
      'List mode:      ncmpp -i inputs.txt -o outputs.txt\n' +
      'Directory mode: ncmpp [-r <scan root>] [-o <target dir> | -p]',
    )
    .configureOutput({
      writeOut: str => io.stdout(str),
      writeErr: str => io.stderr(str),
    })

    .addOption(
      new Option('-t, --threads <n>', 'max count of unlock workers (default: hardware concurrency)')
        .argParser(nonNegativeInt('Thread count')),
    )
    .addOption(new Option('-s, --showtime', 'show how long it took to unlock everything').default(false))
    .addOption(
      new Option('-i, --input <file>', 'text file listing input .ncm files, one per line')
        .default(''),
    )
    .addOption(
      new Option('-o, --output <path>', 'list of output bases (list mode) or target directory')
        .default(DEFAULT_OUTPUT_DIR),
    )
    .addOption(
      new Option('-r, --root <dir>', 'directory scanned for .ncm files when no input list is given')
        .default(DEFAULT_SCAN_ROOT),
    )
    .addOption(
      new Option('-b, --block-size <bytes>', 'payload block size, a multiple of 256')
        .argParser(nonNegativeInt('Block size'))
        .default(DEFAULT_BLOCK_SIZE, String(DEFAULT_BLOCK_SIZE)),
    )
    .addOption(new Option('--no-cover', 'do not write embedded cover images'))
    .addOption(
      new Option('-e, --embed-cover', 'put the cover into FLAC/MP3 tags and delete the .jpg')
        .default(false),
    )
    .addOption(
      new Option('-p, --in-place', 'directory mode: write each output next to its .ncm file')
        .default(false),
    )
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_, previous: number) => previous + 1),
    )

    .action(async () => {
      const opts    = program.opts<RootOptions>();
      const summary = await new BatchDriver({
        threads      : opts.threads,
        showTime     : opts.showtime,
        inputList    : opts.input,
        output       : opts.output,
        scanRoot     : opts.root,
        blockSize    : opts.blockSize,
        inPlace      : opts.inPlace,
        extractCover : opts.cover,
        embedCover   : opts.embedCover,
        verbose      : toVerbosity(1 + opts.verbose),
        logger       : sink,
      }).run();
      io.onSummary?.(summary);
    });

  program
    .command('inspect <file>')
    .description('Print container layout and metadata as JSON; the audio payload is not decrypted')
    .action(async (file: string) => {
      const opts    = program.opts<RootOptions>();
      const decoder = new NcmDecoder({
        blockSize : opts.blockSize,
        logger    : createLogger(toVerbosity(opts.verbose), sink),
      });
      const src = await FileByteSource.open(file);
      try {
        const info = await decoder.inspect(src);
        io.stdout(JSON.stringify({ file, ...info }, null, 2) + '\n');
      } finally {
        await src.close();
      }
    });

  return program;
}
