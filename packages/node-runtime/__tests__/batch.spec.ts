import { readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { BatchDriver, type BatchOptions } from '../src/batch/BatchDriver.js';
import { ConfigError } from '../../core/src/errors/index.js';
import {
  COVER,
  exists,
  makeAudio,
  makeFlac,
  readPictures,
  useTempDir,
  writeContainer,
} from './_fixtures.js';

function driver(opts: BatchOptions): { run: BatchDriver['run']; lines: string[] } {
  const lines: string[] = [];
  const d = new BatchDriver({ threads: 2, ...opts, logger: m => lines.push(m) });
  return { run: () => d.run(), lines };
}

describe('BatchDriver - list mode', () => {
  const tmp = useTempDir();

  it('decodes every pair of lines', async () => {
    const audio = makeAudio(2048);
    await writeContainer(join(tmp(), 'one.ncm'), { audio });
    await writeContainer(join(tmp(), 'two.ncm'), { audio, metadata: { format: 'mp3' } });
    await writeFile(join(tmp(), 'in.txt'), `${join(tmp(), 'one.ncm')}\n${join(tmp(), 'two.ncm')}\n`);
    await writeFile(join(tmp(), 'out.txt'), `${join(tmp(), 'o', 'first')}\r\n${join(tmp(), 'o', 'second')}\r\n`);

    const { run } = driver({ inputList: join(tmp(), 'in.txt'), output: join(tmp(), 'out.txt') });
    const summary = await run();

    expect(summary).toMatchObject({ mode: 'list', total: 2, completed: 2, succeeded: 2, failed: 0 });
    expect((await readdir(join(tmp(), 'o'))).sort()).toEqual(['first.flac', 'second.mp3']);
    expect(new Uint8Array(await readFile(join(tmp(), 'o', 'second.mp3')))).toEqual(audio);
  });

  it('rejects lists of different lengths before touching any file', async () => {
    await writeFile(join(tmp(), 'in.txt'), 'a.ncm\nb.ncm\nc.ncm\n');
    await writeFile(join(tmp(), 'out.txt'), 'x\ny\n');

    const { run } = driver({ inputList: join(tmp(), 'in.txt'), output: join(tmp(), 'out.txt') });
    await expect(run()).rejects.toThrow(
      'Input and output file lists must have the same number of lines (input: 3, output: 2)',
    );
    expect((await readdir(tmp())).sort()).toEqual(['in.txt', 'out.txt']);
  });

  it('rejects an empty list', async () => {
    await writeFile(join(tmp(), 'in.txt'), '\n\n');
    await writeFile(join(tmp(), 'out.txt'), 'x\n');

    const { run } = driver({ inputList: join(tmp(), 'in.txt'), output: join(tmp(), 'out.txt') });
    await expect(run()).rejects.toThrow('Input or output file list is empty.');
  });

  it('rejects a missing list file', async () => {
    const { run } = driver({ inputList: join(tmp(), 'nope.txt'), output: join(tmp(), 'out.txt') });
    await expect(run()).rejects.toThrow(ConfigError);
  });

  it('counts per-file failures without aborting the run', async () => {
    await writeContainer(join(tmp(), 'good.ncm'));
    await writeFile(join(tmp(), 'bad.ncm'), Uint8Array.from([1, 2, 3]));
    await writeFile(join(tmp(), 'in.txt'), `${join(tmp(), 'good.ncm')}\n${join(tmp(), 'bad.ncm')}\n`);
    await writeFile(join(tmp(), 'out.txt'), `${join(tmp(), 'good')}\n${join(tmp(), 'bad')}\n`);

    const { run, lines } = driver({ inputList: join(tmp(), 'in.txt'), output: join(tmp(), 'out.txt') });
    const summary = await run();

    expect(summary).toMatchObject({ total: 2, completed: 2, succeeded: 1, failed: 1 });
    const failure = summary.outcomes.find(o => !o.ok);
    expect(failure?.task.input).toBe(join(tmp(), 'bad.ncm'));
    expect(lines).toContain('1| Total files processed: 2 (1 ok, 1 failed)');
    expect(lines.some(l => /^0\| \[w[01]\] Error processing .*bad\.ncm: \[FormatError\] Truncated container/.test(l)))
      .toBe(true);
    expect(await exists(join(tmp(), 'good.flac'))).toBe(true);
  });

  it('rejects an output list that names one base twice', async () => {
    await writeFile(join(tmp(), 'in.txt'), 'a.ncm\nb.ncm\n');
    await writeFile(join(tmp(), 'out.txt'), `${join(tmp(), 'same')}\n${join(tmp(), 'same')}\n`);

    const { run } = driver({ inputList: join(tmp(), 'in.txt'), output: join(tmp(), 'out.txt') });
    await expect(run()).rejects.toThrow(`Output list names ${join(tmp(), 'same')} more than once`);
  });

  it('refuses in-place output', async () => {
    await writeFile(join(tmp(), 'in.txt'), 'a.ncm\n');
    await writeFile(join(tmp(), 'out.txt'), 'a\n');

    const { run } = driver({ inputList: join(tmp(), 'in.txt'), output: join(tmp(), 'out.txt'), inPlace: true });
    await expect(run()).rejects.toThrow('In-place output applies to directory mode only');
  });
});

describe('BatchDriver - directory mode', () => {
  const tmp = useTempDir();

  it('decodes every .ncm under the scan root into the target', async () => {
    const root = join(tmp(), 'music');
    await writeContainer(join(root, 'alpha.ncm'));
    await writeContainer(join(root, 'album', 'beta.ncm'), { metadata: { format: 'mp3' } });
    await writeFile(join(root, 'readme.txt'), 'not music');

    const target = join(tmp(), 'unlocked');
    const { run, lines } = driver({ scanRoot: root, output: target, threads: 4 });
    const summary = await run();

    expect(summary).toMatchObject({ mode: 'directory', threads: 4, total: 2, succeeded: 2 });
    expect((await readdir(target)).sort()).toEqual(['alpha.flac', 'beta.mp3']);
    expect(lines[0]).toBe('1| Starting NCM processing with 4 threads');
    expect(lines).toContain('1| Processing complete!');
  });

  it('reports an empty run and still creates the target', async () => {
    const target = join(tmp(), 'out');
    const { run, lines } = driver({ scanRoot: join(tmp(), 'empty'), output: target });
    const summary = await run();

    expect(summary).toMatchObject({ total: 0, completed: 0, succeeded: 0, failed: 0, outcomes: [] });
    expect(lines).toContain('1| No .ncm files found to process.');
    expect(lines).toContain('1| Total files processed: 0 (0 ok, 0 failed)');
    expect(await exists(target)).toBe(true);
  });

  it('logs the elapsed time when asked', async () => {
    const { run, lines } = driver({ scanRoot: tmp(), output: join(tmp(), 'out'), showTime: true });
    await run();
    expect(lines.some(l => /^1\| Total time elapsed: \d+\.\d{3}s$/.test(l))).toBe(true);
  });

  it('validates threads and block size up front', async () => {
    await expect(driver({ scanRoot: tmp(), threads: 0 }).run()).rejects.toThrow(ConfigError);
    await expect(driver({ scanRoot: tmp(), blockSize: 100 }).run()).rejects.toThrow(/Invalid block size/);
  });

  it('shows configuration at verbosity 3', async () => {
    const lines: string[] = [];
    await new BatchDriver({
      threads: 2,
      scanRoot: tmp(),
      output: join(tmp(), 'out'),
      verbose: 3,
      logger: m => lines.push(m),
    }).run();
    expect(lines).toContain('3| Configuration:');
    expect(lines).toContain('3|   Input file: <auto-detect>');
    expect(lines).toContain('3|   Block size: 32768');
  });

  it('gives same-named inputs from different folders distinct outputs', async () => {
    const root   = join(tmp(), 'm');
    const first  = makeAudio(50_000);
    const second = new Uint8Array(70_000).fill(0x55);
    await writeContainer(join(root, 'x', 'dup.ncm'), { audio: first });
    await writeContainer(join(root, 'y', 'dup.ncm'), { audio: second });

    const target = join(tmp(), 'out');
    const { run, lines } = driver({ scanRoot: root, output: target, blockSize: 256, verbose: 2 });
    const summary = await run();

    expect(summary).toMatchObject({ total: 2, succeeded: 2, failed: 0 });
    expect((await readdir(target)).sort()).toEqual(['dup (1).flac', 'dup.flac']);
    expect(new Uint8Array(await readFile(join(target, 'dup.flac')))).toEqual(first);
    expect(new Uint8Array(await readFile(join(target, 'dup (1).flac')))).toEqual(second);
    expect(lines).toContain(`2| Name clash for ${join(root, 'y', 'dup.ncm')}, writing to ${join(target, 'dup (1)')}`);
  });

  it('writes beside each input in place', async () => {
    const root = join(tmp(), 'music');
    await writeContainer(join(root, 'alpha.ncm'));
    await writeContainer(join(root, 'album', 'beta.ncm'), { metadata: { format: 'mp3' } });

    const { run, lines } = driver({ scanRoot: root, inPlace: true, verbose: 3 });
    const summary = await run();

    expect(summary).toMatchObject({ total: 2, succeeded: 2 });
    expect((await readdir(root)).sort()).toEqual(['album', 'alpha.flac', 'alpha.ncm']);
    expect((await readdir(join(root, 'album'))).sort()).toEqual(['beta.mp3', 'beta.ncm']);
    expect(lines).toContain('3|   Output: <beside input>');
  });

  it('embeds covers when asked', async () => {
    const root = join(tmp(), 'music');
    await writeContainer(join(root, 'tagged.ncm'), { audio: makeFlac(), cover: COVER });

    const target = join(tmp(), 'out');
    const summary = await driver({ scanRoot: root, output: target, embedCover: true }).run();

    expect(summary.succeeded).toBe(1);
    expect(await readdir(target)).toEqual(['tagged.flac']);
    expect(readPictures(join(target, 'tagged.flac'))).toEqual([COVER]);
  });
});
