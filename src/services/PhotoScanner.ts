import fs from 'fs/promises';
import path from 'path';
import { createLogger } from '../utils/logger';

export const PHOTO_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg', '.png', '.webp', '.tif', '.tiff'];

export interface ScanOptions {
  recursive?: boolean;
  allowExts?: readonly string[];
}

/**
 * Lists the photographs below a folder, sorted by path.
 * Hidden entries and macOS "._" resource forks are skipped.
 */
export class PhotoScanner {
  private readonly logger = createLogger({ component: 'PhotoScanner' });

  async scan(rootPath: string, options: ScanOptions = {}): Promise<string[]> {
    const recursive = options.recursive ?? true;
    const allowExts = new Set(
      (options.allowExts ?? PHOTO_EXTENSIONS).map(e => (e.startsWith('.') ? e : `.${e}`).toLowerCase())
    );

    const found: string[] = [];
    await this.walk(path.resolve(rootPath), recursive, allowExts, found);
    found.sort();

    this.logger.debug({ rootPath, count: found.length }, 'Scan complete');
    return found;
  }

  private async walk(dir: string, recursive: boolean, allowExts: Set<string>, found: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;

      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (recursive) await this.walk(fullPath, recursive, allowExts, found);
      } else if (entry.isFile() && allowExts.has(path.extname(entry.name).toLowerCase())) {
        found.push(fullPath);
      }
    }
  }
}
