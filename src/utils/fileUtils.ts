import fs, { type FileHandle } from 'fs/promises';
import os from 'os';
import path from 'path';

const TEMP_SUFFIX = '.tmp';

// Platforms that cannot open or fsync a directory report one of these
const DIRECTORY_SYNC_UNSUPPORTED = new Set(['EISDIR', 'EPERM', 'EINVAL']);

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * Replace `filePath` with `data` as JSON without ever exposing a half-written file.
 * The document goes to a temp file beside the target, is flushed to disk, then renamed over it;
 * a reader sees either the previous document or the new one.
 * Resolves once the directory entry of the rename is flushed too.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}${TEMP_SUFFIX}`;
  const handle = await fs.open(tempPath, 'w');
  try {
    await handle.writeFile(JSON.stringify(data, null, 2) + '\n', 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  await syncDirectory(dir);
}

async function syncDirectory(dir: string): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await fs.open(dir, 'r');
  } catch (error) {
    if (isDirectorySyncUnsupported(error)) return;
    throw error;
  }

  try {
    await handle.sync();
  } catch (error) {
    if (!isDirectorySyncUnsupported(error)) throw error;
  } finally {
    await handle.close();
  }
}

/**
 * Read a JSON document, or null when the file does not exist.
 * A file that exists but does not parse is an error, never "empty".
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  return JSON.parse(text);
}

/**
 * Remove temp files left behind by a process killed between write and rename
 */
export async function removeStaleTempFiles(filePath: string): Promise<string[]> {
  const dir = path.dirname(filePath);
  const prefix = `${path.basename(filePath)}.`;

  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const stale = names.filter(name => name.startsWith(prefix) && name.endsWith(TEMP_SUFFIX));
  await Promise.all(stale.map(name => fs.rm(path.join(dir, name), { force: true })));
  return stale;
}

function isDirectorySyncUnsupported(error: unknown): boolean {
  return isNodeError(error) && error.code !== undefined && DIRECTORY_SYNC_UNSUPPORTED.has(error.code);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
