// packages/node-runtime/src/batch/discovery.ts
import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { ConfigError } from '../../../core/src/errors/index.js';
import { describeFsError } from '../FileByteSource.js';

/**
 * Non-blank lines of a newline-delimited list file (LF or CRLF).
 * @throws {ConfigError} when the file cannot be read
 */
export async function readListFile(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, { encoding: 'utf8' });
  } catch (err) {
    throw new ConfigError(`Unable to read list file ${path}: ${describeFsError(err)}`);
  }
  return text
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0);
}

/**
 * Regular files under `root` (recursively) whose extension equals `ext`
 * exactly. Symlinks to regular files count; symlinked directories are not
 * entered and dangling links are skipped. A missing root yields no files.
 * Paths are sorted.
 */
export async function findFiles(root: string, ext: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (dir === root && isMissing(err)) return;
      throw new ConfigError(`Unable to scan ${dir}: ${describeFsError(err)}`);
    }
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (extname(entry.name) === ext
          && (entry.isFile() || (entry.isSymbolicLink() && await linksToFile(full)))) {
        found.push(full);
      }
    }
  }

  await walk(root);
  return found.sort();
}

async function linksToFile(link: string): Promise<boolean> {
  try {
    return (await stat(link)).isFile();
  } catch (err) {
    if (isMissing(err)) return false;
    throw new ConfigError(`Unable to follow ${link}: ${describeFsError(err)}`);
  }
}

function isMissing(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = Reflect.get(err, 'code');
  return code === 'ENOENT' || code === 'ENOTDIR' || code === 'ELOOP';
}
