import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { PhotoScanner } from '../PhotoScanner';

describe('PhotoScanner', () => {
  let dir: string;
  const scanner = new PhotoScanner();

  async function touch(relative: string): Promise<void> {
    const file = path.join(dir, relative);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '');
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanner-'));
    await touch('b.jpg');
    await touch('a.JPEG');
    await touch('notes.txt');
    await touch('.hidden.jpg');
    await touch('._a.JPEG');
    await touch('trip/c.png');
    await touch('trip/deeper/d.tiff');
    await touch('.thumbnails/e.jpg');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should list photos recursively in path order', async () => {
    const photos = await scanner.scan(dir);

    expect(photos).toEqual([
      path.join(dir, 'a.JPEG'),
      path.join(dir, 'b.jpg'),
      path.join(dir, 'trip', 'c.png'),
      path.join(dir, 'trip', 'deeper', 'd.tiff'),
    ]);
  });

  it('should stay in the top folder when not recursive', async () => {
    const photos = await scanner.scan(dir, { recursive: false });

    expect(photos).toEqual([path.join(dir, 'a.JPEG'), path.join(dir, 'b.jpg')]);
  });

  it('should honour a custom extension list', async () => {
    const photos = await scanner.scan(dir, { allowExts: ['png', 'TIFF'] });

    expect(photos).toEqual([
      path.join(dir, 'trip', 'c.png'),
      path.join(dir, 'trip', 'deeper', 'd.tiff'),
    ]);
  });

  it('should reject a missing folder', async () => {
    await expect(scanner.scan(path.join(dir, 'missing'))).rejects.toThrow();
  });
});
